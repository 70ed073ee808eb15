export * from "./core/index.ts";
export type { GameDriver } from "./driver/gameDriver.ts";
export { LocalDriver, createLocalDriver } from "./driver/localDriver.ts";
export type { ClickResult } from "./controller/gameController.ts";
export { GameController } from "./controller/gameController.ts";
export type { EngineConfig } from "./config.ts";
export { DEFAULT_LOG_PREFIX, readEngineConfig } from "./config.ts";
