/**
 * Hold'em table engine
 *
 * Public entry point: engine, pot accounting, table config and controllers.
 */

export * from './game/engine';
export * from './economy';
export * from './game/config/TableConfig';
export * from './game/config/TableConfigErrors';
export * from './game/controller';
export { parseActionInput, ParseResult, ACTION_INPUT_HELP } from './cli/parseActionInput';
export { renderTable, renderPlayerRow } from './cli/renderTable';
