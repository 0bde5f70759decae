import type { Logger } from "./logger.js";

export type Clock = () => number;

const performanceClock: Clock = () => performance.now();

export const formatElapsed = (milliseconds: number): string => `${(milliseconds / 1000).toFixed(2)}s`;

export const timed = <T>(logger: Logger, action: string, run: () => T, now: Clock = performanceClock): T => {
  const startedAt = now();
  const result = run();
  logger.info(`${action} finished in ${formatElapsed(now() - startedAt)}`);
  return result;
};

export const timedAsync = async <T>(
  logger: Logger,
  action: string,
  run: () => Promise<T>,
  now: Clock = performanceClock,
): Promise<T> => {
  const startedAt = now();
  const result = await run();
  logger.info(`${action} finished in ${formatElapsed(now() - startedAt)}`);
  return result;
};
