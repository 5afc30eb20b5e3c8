/**
 * mailbox-report command line
 *
 *   mailbox-report --database DB01 --out report.html
 *   mailbox-report --all --send-email --mail-from reports@example.com \
 *     --mail-to admins@example.com --mail-server smtp.example.com
 *
 * The HTML document goes to stdout unless --out is given; logs go to stderr.
 */

import { Console } from 'node:console';
import { readFileSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { parseArgs } from 'node:util';
import { loadConfig, parsePositiveInt, type ReportConfig } from './config';
import { ConfigurationError, errorMessage } from './errors';
import { createFixtureDirectory } from './fixtures';
import { HttpMailboxDirectory, type MailboxDirectory } from './report/directory';
import { SmtpMailSender, type MailSender } from './report/mailer';
import { runReport, type ReportMailOptions } from './report/run';
import type { Logger, MailboxScope } from './types';

export const USAGE = `Usage: mailbox-report <selection> [options]

Selection (exactly one):
  --all                    every mailbox
  --server <name>          mailboxes on a server
  --database <name>        mailboxes in a database
  --file <path>            identities listed in a file, one per line
  --mailbox <identity>     a single mailbox

Options:
  --out <path>             write the HTML report to a file instead of stdout
  --api-url <url>          management API (default: $MAILBOX_API_URL)
  --concurrency <n>        parallel statistics lookups (default 4)
  --demo                   use the built-in sample directory
  --send-email             mail the report (needs the three options below)
  --mail-from <address>
  --mail-to <addresses>    comma-separated
  --mail-server <host>
  --mail-port <port>       default: $SMTP_PORT or 25
  --help
`;

export interface CliOptions {
  scope: MailboxScope;
  out?: string;
  apiUrl?: string;
  concurrency: number;
  demo: boolean;
  mail?: ReportMailOptions;
  help: boolean;
}

/**
 * Identities from a --file list: one per line, blank lines and # comments ignored
 */
export function parseIdentityList(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line !== '' && !line.startsWith('#'));
}

function splitAddresses(value: string): string[] {
  return value
    .split(/[,;]/)
    .map(address => address.trim())
    .filter(address => address !== '');
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      strict: true,
      allowPositionals: false,
      options: {
        all: { type: 'boolean' },
        server: { type: 'string' },
        database: { type: 'string' },
        file: { type: 'string' },
        mailbox: { type: 'string' },
        out: { type: 'string' },
        'api-url': { type: 'string' },
        concurrency: { type: 'string' },
        demo: { type: 'boolean' },
        'send-email': { type: 'boolean' },
        'mail-from': { type: 'string' },
        'mail-to': { type: 'string' },
        'mail-server': { type: 'string' },
        'mail-port': { type: 'string' },
        help: { type: 'boolean' },
      },
    }).values;
  } catch (err) {
    // unknown option, missing value, stray positional
    throw new ConfigurationError(errorMessage(err), { cause: err });
  }
}

export function parseCliArgs(
  argv: string[],
  config: ReportConfig,
  readText: (path: string) => string = path => readFileSync(path, 'utf8')
): CliOptions {
  const values = readArgs(argv);

  if (values.help) {
    return { scope: { kind: 'all' }, concurrency: config.concurrency, demo: false, help: true };
  }

  const selections: MailboxScope[] = [];
  if (values.all) selections.push({ kind: 'all' });
  if (values.server !== undefined) selections.push({ kind: 'server', server: values.server });
  if (values.database !== undefined) selections.push({ kind: 'database', database: values.database });
  if (values.file !== undefined) {
    selections.push({ kind: 'mailboxes', identities: parseIdentityList(readText(values.file)) });
  }
  if (values.mailbox !== undefined) selections.push({ kind: 'mailboxes', identities: [values.mailbox] });

  if (selections.length !== 1) {
    throw new ConfigurationError(
      'Specify exactly one of --all, --server, --database, --file or --mailbox'
    );
  }

  let mail: ReportMailOptions | undefined;
  if (values['send-email']) {
    const from = values['mail-from'];
    const to = values['mail-to'] !== undefined ? splitAddresses(values['mail-to']) : [];
    const smtpHost = values['mail-server'];
    if (!from || to.length === 0 || !smtpHost) {
      throw new ConfigurationError('--send-email requires --mail-from, --mail-to and --mail-server');
    }
    const port = values['mail-port'];
    mail = {
      from,
      to,
      smtpHost,
      smtpPort: port !== undefined ? parsePositiveInt('--mail-port', port) : config.smtpPort,
    };
  }

  return {
    scope: selections[0],
    out: values.out,
    apiUrl: values['api-url'] ?? config.apiUrl,
    concurrency:
      values.concurrency !== undefined
        ? parsePositiveInt('--concurrency', values.concurrency)
        : config.concurrency,
    demo: values.demo ?? false,
    mail,
    help: false,
  };
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  directory?: MailboxDirectory;
  mailer?: MailSender;
  stdout?: (text: string) => void;
  readText?: (path: string) => string;
  logger?: Logger;
}

/**
 * Run the CLI; resolves to the process exit code
 */
export async function main(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => void process.stdout.write(text));
  // stdout carries the report, so everything else goes to stderr
  const logger = deps.logger ?? new Console({ stdout: process.stderr, stderr: process.stderr });

  try {
    const config = loadConfig(deps.env ?? process.env);
    const options = parseCliArgs(argv, config, deps.readText);

    if (options.help) {
      stdout(USAGE);
      return 0;
    }

    const directory = deps.directory ?? createDirectory(options, config, logger);
    const mailer = options.mail ? deps.mailer ?? new SmtpMailSender({ logger }) : undefined;

    const result = await runReport(
      { scope: options.scope, concurrency: options.concurrency, mail: options.mail },
      { directory, mailer, logger }
    );

    if (options.out) {
      await writeFile(options.out, result.html, 'utf8');
      logger.log(`[CLI] Report written to ${options.out}`);
    } else {
      stdout(result.html);
    }
    if (result.sent) {
      logger.log(`[CLI] Report mailed (${result.sent.messageId})`);
    }
    return 0;
  } catch (err) {
    const name = err instanceof Error ? err.name : 'Error';
    logger.error(`[CLI] ${name}: ${errorMessage(err)}`);
    if (err instanceof ConfigurationError) {
      logger.error(`\n${USAGE}`);
    }
    return 1;
  }
}

function createDirectory(options: CliOptions, config: ReportConfig, logger: Logger): MailboxDirectory {
  if (options.demo) {
    return createFixtureDirectory();
  }
  if (!options.apiUrl) {
    throw new ConfigurationError('--api-url or MAILBOX_API_URL is required');
  }
  return new HttpMailboxDirectory({ baseUrl: options.apiUrl, token: config.apiToken, logger });
}
