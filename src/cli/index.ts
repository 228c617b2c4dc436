export type { DemoOptions, DemoReport, MainOptions } from './demo.js';
export { FIRST_ACCOUNT, SECOND_ACCOUNT, main, parseMode, runDemo } from './demo.js';
