export const DEFAULT_LOG_PREFIX = "[chess-engine]";

export interface EngineConfig {
  /** One console line per applied move, reset and game end. */
  logMoves: boolean;
  logPrefix: string;
}

export function readEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const prefix = env.CHESS_ENGINE_LOG_PREFIX;
  return {
    logMoves: env.CHESS_ENGINE_LOG === "1",
    logPrefix: prefix && prefix.trim() ? prefix.trim() : DEFAULT_LOG_PREFIX,
  };
}
