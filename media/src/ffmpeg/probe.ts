import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { createLogger, describeError, WarningCode, type Logger } from '@tierline/core';

const execFileAsync = promisify(execFile);

/** Runs a probe binary and returns its standard output */
export type ProbeExecutor = (binary: string, args: readonly string[]) => Promise<string>;

export interface ProbeOptions {
  /** ffprobe executable (default `ffprobe` on the PATH) */
  binary?: string;
  executor?: ProbeExecutor;
  logger?: Logger;
}

const defaultExecutor: ProbeExecutor = async (binary, args) => {
  const { stdout } = await execFileAsync(binary, [...args], {
    encoding: 'utf8',
    maxBuffer: 10 * 1024 * 1024,
  });
  return stdout;
};

export function parseDurationOutput(stdout: string): number | undefined {
  const seconds = Number.parseFloat(stdout.trim());
  return Number.isFinite(seconds) && seconds >= 0 ? Math.round(seconds * 1000) : undefined;
}

/**
 * Media duration in milliseconds, or undefined when it cannot be determined.
 * Failures are logged as warnings, never thrown.
 */
export async function probeDurationMs(
  mediaPath: string,
  options: ProbeOptions = {},
): Promise<number | undefined> {
  const logger = options.logger ?? createLogger();
  const binary = options.binary ?? 'ffprobe';
  const executor = options.executor ?? defaultExecutor;

  try {
    const stdout = await executor(binary, [
      '-v', 'error',
      '-show_entries', 'format=duration',
      '-of', 'csv=p=0',
      mediaPath,
    ]);
    const duration = parseDurationOutput(stdout);
    if (duration === undefined) {
      logger.warn(
        `[${WarningCode.DURATION_UNAVAILABLE}] ${binary} reported no duration for ${mediaPath}.`,
      );
    }
    return duration;
  } catch (error) {
    logger.warn(
      `[${WarningCode.DURATION_UNAVAILABLE}] Could not probe duration of ${mediaPath}: ${describeError(error)}`,
    );
    return undefined;
  }
}
