/**
 * renderTable.ts
 * Plain-text table view for the console front end
 */

import { formatCards } from '../game/engine/Card';
import { PlayerView, PotView, TableSnapshot } from '../game/engine/Snapshot';

function positionLabel(player: PlayerView): string {
  const labels: string[] = [];
  if (player.isDealer) labels.push('BTN');
  if (player.isSmallBlind) labels.push('SB');
  if (player.isBigBlind) labels.push('BB');
  return labels.join('/');
}

function statusLabel(player: PlayerView): string {
  switch (player.status) {
    case 'folded': return 'FOLDED';
    case 'all-in': return 'ALL-IN';
    case 'sitting-out': return 'OUT';
    default: return '';
  }
}

function formatPots(pots: readonly PotView[], potTotal: number): string {
  if (pots.length <= 1) {
    return `Pot: ${potTotal}`;
  }
  const parts = pots.map(pot => (pot.index === 0 ? `main ${pot.amount}` : `side ${pot.index} ${pot.amount}`));
  return `Pot: ${potTotal} (${parts.join(', ')})`;
}

/**
 * Render one player's row. The actor is marked with ">".
 */
export function renderPlayerRow(player: PlayerView): string {
  const marker = player.isActor ? '>' : ' ';
  const position = positionLabel(player);
  const cards = player.holeCards ? `[${formatCards(player.holeCards)}]` : '';
  const bet = player.currentBet > 0 ? `bet ${player.currentBet}` : '';

  return [
    `${marker} ${player.seat}: ${player.name}`,
    position ? `(${position})` : '',
    `stack ${player.stack}`,
    bet,
    statusLabel(player),
    cards,
  ]
    .filter(part => part.length > 0)
    .join('  ');
}

/**
 * Render the whole table as lines of text
 */
export function renderTable(snapshot: TableSnapshot): string {
  const lines: string[] = [];

  const street = snapshot.street ? snapshot.street.toUpperCase() : 'WAITING';
  lines.push(`Hand #${snapshot.handNumber}  ${street}  Blinds ${snapshot.smallBlind}/${snapshot.bigBlind}`);
  lines.push(`Board: ${snapshot.board.length > 0 ? `[${formatCards(snapshot.board)}]` : '[]'}`);
  lines.push(formatPots(snapshot.pots, snapshot.potTotal));

  for (const player of snapshot.players) {
    lines.push(renderPlayerRow(player));
  }

  return lines.join('\n');
}
