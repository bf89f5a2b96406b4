import { existsSync, readFileSync } from 'fs';
import { KubectlEventDescriber, loadStatusBundle, renderCertificateStatus } from '../../index.js';
import { debugCli } from '../../lib/utils/debug.js';

/** Options for the `status certificate` command. */
export interface StatusCertificateOptions {
  /** Path of the JSON status bundle */
  bundle: string;
  /** Reference time for event ages; defaults to the current time */
  now?: Date;
}

/** Print the status of the Certificate described by a status bundle. */
export async function handleStatusCertificateCommand(
  options: StatusCertificateOptions,
): Promise<string> {
  if (!existsSync(options.bundle)) {
    throw new Error(`Status bundle not found: ${options.bundle}`);
  }

  debugCli('reading status bundle %s', options.bundle);
  const status = loadStatusBundle(readFileSync(options.bundle, 'utf-8'));

  const now = options.now;
  const describer = new KubectlEventDescriber(now ? { now: () => now } : {});
  const output = renderCertificateStatus(status, describer);
  process.stdout.write(output);
  return output;
}
