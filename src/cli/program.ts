import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { handleError } from './utils/errors.js';
import { handleStatusCertificateCommand } from './commands/status.js';

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

/** Build a Commander program instance for the certlens CLI. */
export function createCli(): Command {
  const program = new Command();

  program
    .name('certlens')
    .description('Describe the status of cert-manager Certificates')
    .version(readVersion());

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env.CERTLENS_CLI_TEST) {
    program.exitOverride();
  }

  function exitOnError() {
    if (process.env.CERTLENS_CLI_TEST) return;
    process.exit(1);
  }

  const status = program.command('status').description('Show the status of a resource');

  status
    .command('certificate')
    .alias('cert')
    .description('Describe a Certificate together with its issuer, Secret and CertificateRequest')
    .requiredOption('-b, --bundle <path>', 'JSON status bundle with the fetched resources')
    .option('--now <timestamp>', 'Reference time for event ages (RFC 3339)')
    .action(async (opts: { bundle: string; now?: string }) => {
      try {
        const now = opts.now === undefined ? undefined : new Date(opts.now);
        if (now && Number.isNaN(now.getTime())) {
          throw new Error(`Invalid --now timestamp: ${opts.now}`);
        }
        await handleStatusCertificateCommand({ bundle: opts.bundle, now });
      } catch (e) {
        handleError(e);
        exitOnError();
      }
    });

  return program;
}

/** For tests: parse arguments and return the program (no automatic exit). */
export async function runCli(argv: string[]): Promise<Command> {
  const program = createCli();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
    if (
      process.env.CERTLENS_CLI_TEST &&
      (code === 'commander.helpDisplayed' || code === 'commander.version')
    ) {
      return program;
    }
    throw err;
  }
  return program;
}
