import { Command, CommanderError } from 'commander';
import * as path from 'path';
import { describeManifest, downloadAudiobook, postProcessOnly } from './audiobook';
import { AppError, ERROR_CODES, toUserMessage } from './core/errors';
import { logger, setLogLevel } from './core/logger';
import { expandHome } from './core/paths';
import { loadSettings } from './core/settings';
import { loadManifest } from './odm/manifest';
import { ConsoleProgress, type ProgressStream } from './odm/progress';

export type CliOptions = {
  debug: boolean;
  tags: boolean;
  owner: boolean;
  skipDownload: boolean;
  force: boolean;
  config?: string | undefined;
  printMetadata: boolean;
};

export interface CliIo {
  stdout: ProgressStream;
  stderr: { write(chunk: string): boolean };
}

const EXIT_USAGE = 2;

export function buildProgram(io: CliIo): Command {
  return new Command()
    .name('odm-fetch')
    .description('Download the audiobook described by an OverDrive .odm loan file')
    .argument('<filename>', 'ODM file to download')
    .option('-d, --debug', 'print debug messages', false)
    .option('-t, --tags', 'update ID3 tags according to configuration', false)
    .option('-o, --owner', 'update file owner according to configuration', false)
    .option(
      '-s, --skip-download',
      'skip downloading files; only valid with --tags or --owner, and the files must already exist',
      false
    )
    .option('-f, --force', 'download all files, replacing any existing files', false)
    .option('-c, --config <file>', 'configuration file in TOML format (default: ./config.toml)')
    .option('-m, --print-metadata', 'print the book metadata and exit', false)
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    })
    .exitOverride();
}

async function execute(odmPath: string, options: CliOptions, io: CliIo): Promise<void> {
  if (options.printMetadata) {
    const manifest = await loadManifest(odmPath);
    io.stdout.write(`${describeManifest(manifest)}\n`);
    return;
  }

  if (options.skipDownload && !options.tags && !options.owner) {
    throw new AppError(
      ERROR_CODES.ERR_USAGE,
      "Must include '--tags' or '--owner' options when specifying '--skip-download'"
    );
  }

  const settings = await loadSettings(options.config);

  if (options.skipDownload) {
    await postProcessOnly(odmPath, settings, { tags: options.tags, owner: options.owner });
    return;
  }

  await downloadAudiobook(odmPath, settings, {
    tags: options.tags,
    owner: options.owner,
    force: options.force,
    progress: new ConsoleProgress(io.stdout),
  });
}

/** Runs the tool and resolves with the process exit code. */
export async function main(argv: string[], io: CliIo = { stdout: process.stdout, stderr: process.stderr }): Promise<number> {
  const program = buildProgram(io);
  try {
    program.parse(argv, { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const options = program.opts<CliOptions>();
  const [filename] = program.args;
  if (options.debug) setLogLevel('debug');

  try {
    if (!filename) {
      throw new AppError(ERROR_CODES.ERR_USAGE, 'An ODM file is required');
    }
    await execute(path.resolve(expandHome(filename)), options, io);
    return 0;
  } catch (error) {
    if (error instanceof AppError) {
      logger.debug({ code: error.code, details: error.details }, 'Run failed');
      io.stderr.write(`${toUserMessage(error)}\n`);
      return error.code === ERROR_CODES.ERR_USAGE ? EXIT_USAGE : 1;
    }
    logger.error({ error }, 'Unexpected error');
    io.stderr.write(`ERROR: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}
