/**
 * Finds the pid holding a Unix socket open (lsof -t)
 */

import config from '../../config';
import { ILogger, IProcessLauncher } from '../../domain/interfaces';

export async function findSocketOwner(
  launcher: IProcessLauncher,
  socketPath: string,
  logger: ILogger,
  lsofBin: string = config.LSOF_BIN
): Promise<number | null> {
  if (!launcher.isAvailable(lsofBin)) {
    logger.debug(`${lsofBin} not available, cannot resolve owner of ${socketPath}`);
    return null;
  }

  const lookup = launcher.spawn(lsofBin, ['-t', socketPath], { captureOutput: true });
  await lookup.exitPromise;

  const pid = lookup
    .output()
    .split(/\s+/)
    .map((token) => parseInt(token, 10))
    .find((value) => Number.isInteger(value) && value > 0);

  return pid ?? null;
}
