// Command-line entry point: extract one listing or collect ad links from a search
import { writeFileSync } from 'fs';
import { parseArgs } from 'node:util';
import {
  AcquisitionError,
  LISTING_FIELDS,
  LISTING_READY_SELECTOR,
  LISTING_REVEAL_TARGETS,
  collectAdLinks,
  isListingUrl,
  loadConfig,
  runExtraction,
  setLogLevel,
  type ExtractorConfig,
} from '@autofields/extractor';
import { getErrorInfo, getErrorMessage, type AcquisitionMode, type ErrorCode } from '@autofields/shared';
import { formatLinks, formatReport } from './report';

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: Record<string, string | undefined>;
  writeFile: (path: string, content: string) => void;
}

const consoleIO: CliIO = {
  stdout: text => console.log(text),
  stderr: text => console.error(text),
  env: process.env,
  writeFile: (path, content) => writeFileSync(path, content, 'utf-8'),
};

export const DEFAULT_LINKS_FILE = 'links_olx.txt';

export const USAGE = [
  'Usage:',
  '  autofields extract <url> [--mode auto|dynamic|static] [--json]',
  '  autofields links <url> [--max N] [--out FILE]',
].join('\n');

const MODES: readonly AcquisitionMode[] = ['auto', 'dynamic', 'static'];

function isMode(value: string): value is AcquisitionMode {
  return MODES.some(mode => mode === value);
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function hintFor(code: ErrorCode): string {
  const info = getErrorInfo(code);
  return info ? `Hint: ${info.recommendation}` : '';
}

interface ExtractArgs {
  url: string;
  mode: AcquisitionMode;
  json: boolean;
}

async function extractCommand(args: ExtractArgs, config: ExtractorConfig, io: CliIO): Promise<number> {
  try {
    const report = await runExtraction(args.url, LISTING_FIELDS, {
      mode: args.mode,
      dynamicEnabled: config.dynamicEnabled,
      timeoutMs: config.acquireTimeoutMs,
      renderWaitMs: config.renderWaitMs,
      waitForSelector: LISTING_READY_SELECTOR,
      revealSelectors: config.revealPhone ? LISTING_REVEAL_TARGETS : [],
      userAgent: config.userAgent,
      executablePath: config.chromiumExecutablePath,
    });

    io.stdout(args.json ? JSON.stringify(report, null, 2) : formatReport(report));
    return report.complete ? 0 : 2;
  } catch (error) {
    if (error instanceof AcquisitionError) {
      const attempts = error.attempts.map(attempt => {
        const info = getErrorInfo(attempt.errorCode);
        const label = info ? `${info.title}${info.retryable ? ', retryable' : ''}` : 'failed';
        return `  ${attempt.backend}: ${label}`;
      });
      io.stderr([error.message, ...attempts, hintFor(error.code)].join('\n'));
      return 1;
    }
    throw error;
  }
}

interface LinksArgs {
  url: string;
  maxPages: number;
  outFile: string;
}

async function linksCommand(args: LinksArgs, config: ExtractorConfig, io: CliIO): Promise<number> {
  const links = await collectAdLinks(args.url, {
    maxPages: args.maxPages,
    delayMs: config.linksDelayMs,
    timeoutMs: config.acquireTimeoutMs,
    userAgent: config.userAgent,
  });
  io.writeFile(args.outFile, links.map(link => `${link}\n`).join(''));
  io.stdout(`${formatLinks(links)}\nSaved to ${args.outFile}`);
  return 0;
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      mode: { type: 'string', default: 'auto' },
      json: { type: 'boolean', default: false },
      max: { type: 'string' },
      out: { type: 'string', default: DEFAULT_LINKS_FILE },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
}

/**
 * Run one command and resolve with the process exit code:
 * 1 on bad input or when the page could not be loaded, 2 when required fields are missing
 */
export async function run(argv: string[], io: CliIO = consoleIO): Promise<number> {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (error) {
    io.stderr(`${messageOf(error)}\n\n${USAGE}`);
    return 1;
  }

  const { values, positionals } = parsed;
  const [command, url] = positionals;

  if (values.help) {
    io.stdout(USAGE);
    return 0;
  }
  if ((command !== 'extract' && command !== 'links') || !url || positionals.length > 2) {
    io.stderr(USAGE);
    return 1;
  }
  if (!isListingUrl(url)) {
    io.stderr(`${getErrorMessage('INVALID_URL')} Got: ${url}\n${hintFor('INVALID_URL')}`);
    return 1;
  }

  let config: ExtractorConfig;
  try {
    config = loadConfig(io.env);
  } catch (error) {
    io.stderr(`${getErrorMessage('CONFIG_INVALID')}\n${messageOf(error)}\n${hintFor('CONFIG_INVALID')}`);
    return 1;
  }
  setLogLevel(config.logLevel);

  if (command === 'links') {
    const maxPages = values.max === undefined ? config.linksMaxPages : Number(values.max);
    if (!Number.isInteger(maxPages) || maxPages < 1) {
      io.stderr(`--max must be a positive integer, got "${values.max}"`);
      return 1;
    }
    return linksCommand({ url, maxPages, outFile: values.out ?? DEFAULT_LINKS_FILE }, config, io);
  }

  const mode = values.mode ?? 'auto';
  if (!isMode(mode)) {
    io.stderr(`--mode must be one of ${MODES.join(', ')}, got "${mode}"`);
    return 1;
  }
  return extractCommand({ url, mode, json: values.json ?? false }, config, io);
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error instanceof Error ? error.stack ?? error.message : String(error));
      process.exitCode = 1;
    }
  );
}
