/**
 * Exit module - the Exit error wrapper and the reporting entry points
 */

export { Exit, renderDisplayable, resultFromCode, exitWithMessage, toExit } from './exit';
export type { Displayable, ExitResult } from './exit';
export { withCode, withCodeAsync, toSysexits } from './with-code';
export { report, exit } from './report';
export { runMain, settleMain } from './run-main';
export type { MainFunction } from './run-main';
