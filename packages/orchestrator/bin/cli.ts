#!/usr/bin/env node
import { Command, CommanderError, InvalidOptionArgumentError } from 'commander';
import { createRequire } from 'node:module';
import process from 'node:process';
import ora from 'ora';
import pc from 'picocolors';

import {
  type Checkpoint,
  type MigrationEvent,
  type MigrationRunResult,
  type PipelineLogger,
  type ReindexerConfigOverrides,
  createPinoPipelineLogger,
  createReindexer,
  loadEnvFilesWithSummary,
  promptConfirm,
} from '../src/index.js';
import { combinePipelineLoggers, consolePipelineLogger, createLogger } from '../src/logger.js';

const envSummary = loadEnvFilesWithSummary({
  files: ['.env'],
  cwd: process.cwd(),
  assignToProcess: true,
  override: false,
});

const rawArgs = process.argv.slice(2);
const require = createRequire(import.meta.url);
const { version: pkgVersion } = require('../package.json') as { version: string };

if (rawArgs.includes('--version') || rawArgs.includes('-v')) {
  console.log(pkgVersion);
  process.exit(0);
}

const command = rawArgs[0] && !rawArgs[0].startsWith('-') ? rawArgs[0] : null;
const jsonOutput = rawArgs.includes('--json');
const logger = createLogger({ json: jsonOutput });

const USAGE = `Usage:
  reindexer run --source <pattern> --dest <name> [options]
      --hosts <a,b>             Store base URLs (overrides REINDEXER_HOSTS)
      --resume                  Continue the existing job for these segments
      --yes                     Skip the confirmation prompt
      --dry-run                 Show the plan without writing anything
      --read-only-source        Block writes on each segment before migrating it
      --read-only-dest          Block writes on the destination once finished
      --checkpoint-index <name> Collection holding checkpoints
      --poll-interval <ms>      Delay between task status polls
      --settle-delay <ms>       Pause after opening a closed segment
      --stall-polls <n>         Fail after n polls without progress (0 = never)
      --json                    Emit structured JSON log output

  reindexer status [--hosts <a,b>] [--checkpoint-index <name>] [--json]`;

const usage = (code: number): number => {
  (code === 0 ? console.log : console.error)(USAGE);
  return code;
};

interface RunFlags {
  source: string;
  dest: string;
  resume: boolean;
  yes: boolean;
  dryRun: boolean;
  overrides: ReindexerConfigOverrides;
}

const parseNonNegativeInt = (value: string, label: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidOptionArgumentError(`${label} must be a non-negative integer.`);
  }
  return parsed;
};

const collectCsv = (value: string, previous: string[] = []): string[] => {
  const parsed = value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);
  return [...new Set([...previous, ...parsed])];
};

const stripGlobalFlags = (args: string[]): string[] => args.filter((arg) => arg !== '--json');

const parseWithCommander = async (program: Command, args: string[]): Promise<Command> => {
  program.exitOverride();
  try {
    return await program.parseAsync(['node', 'cli.js', ...stripGlobalFlags(args)], {
      from: 'node',
    });
  } catch (error) {
    if (error instanceof CommanderError) {
      const message = error.message.trim();
      if (message) console.error(pc.red(message));
      process.exit(error.exitCode);
    }
    throw error;
  }
};

const withConnectionOptions = (program: Command): Command =>
  program
    .option('--hosts <urls>', 'Comma-separated store base URLs', collectCsv)
    .option('--checkpoint-index <name>', 'Collection holding checkpoints');

const parseRunFlags = async (args: string[]): Promise<RunFlags> => {
  const program = withConnectionOptions(
    new Command('run')
      .usage('--source <pattern> --dest <name> [options]')
      .allowExcessArguments(false)
      .requiredOption('--source <pattern>', 'Segment name or wildcard pattern')
      .requiredOption('--dest <name>', 'Destination collection'),
  )
    .option('--resume', 'Continue the existing job for these segments')
    .option('--yes', 'Skip the confirmation prompt')
    .option('--dry-run', 'Show the plan without writing anything')
    .option('--read-only-source', 'Block writes on each segment before migrating it')
    .option('--read-only-dest', 'Block writes on the destination once finished')
    .option('--poll-interval <ms>', 'Delay between task status polls', (value) =>
      parseNonNegativeInt(value, 'Poll interval'),
    )
    .option('--settle-delay <ms>', 'Pause after opening a closed segment', (value) =>
      parseNonNegativeInt(value, 'Settle delay'),
    )
    .option('--stall-polls <n>', 'Fail after n polls without progress', (value) =>
      parseNonNegativeInt(value, 'Stall polls'),
    );

  const parsed = await parseWithCommander(program, args);
  const opts = parsed.opts<{
    source: string;
    dest: string;
    hosts?: string[];
    checkpointIndex?: string;
    resume?: boolean;
    yes?: boolean;
    dryRun?: boolean;
    readOnlySource?: boolean;
    readOnlyDest?: boolean;
    pollInterval?: number;
    settleDelay?: number;
    stallPolls?: number;
  }>();

  return {
    source: opts.source,
    dest: opts.dest,
    resume: Boolean(opts.resume),
    yes: Boolean(opts.yes),
    dryRun: Boolean(opts.dryRun),
    overrides: {
      hosts: opts.hosts,
      checkpointCollection: opts.checkpointIndex,
      pollIntervalMs: opts.pollInterval,
      settleDelayMs: opts.settleDelay,
      stallPolls: opts.stallPolls,
      readOnlySource: opts.readOnlySource ? true : undefined,
      readOnlyDestination: opts.readOnlyDest ? true : undefined,
    },
  };
};

const buildPipelineLogger = (): PipelineLogger => {
  const consoleSink = consolePipelineLogger(logger);
  // structured stderr logs are opt-in for the CLI
  if (!process.env.LOG_LEVEL) return consoleSink;
  return combinePipelineLoggers(consoleSink, createPinoPipelineLogger());
};

const formatCount = (value: number | null): string => (value === null ? 'unknown' : String(value));

const describePlan = (checkpoint: Checkpoint, resumed: boolean): string => {
  const segments = checkpoint.sourceSegments.join(', ');
  if (!resumed) {
    return `Would migrate ${checkpoint.sourceSegments.length} segment(s) into ${checkpoint.destination}: ${segments}`;
  }
  const at = checkpoint.currentSegment === '' ? 'the first segment' : checkpoint.currentSegment;
  return `Would resume checkpoint ${checkpoint.id} (${checkpoint.status}) into ${checkpoint.destination} after ${at}: ${segments}`;
};

async function handleRun(args: string[]): Promise<number> {
  const flags = await parseRunFlags(args);
  const reindexer = createReindexer({ overrides: flags.overrides, logger: buildPipelineLogger() });

  const useFancy = !jsonOutput && Boolean(process.stderr.isTTY);
  const spinner = useFancy ? ora({ spinner: 'dots', color: 'cyan', stream: process.stderr }) : null;

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    if (spinner?.isSpinning) spinner.stop();
    logger.warn(`Received ${signal}; saving checkpoint before exiting`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const onEvent = (event: MigrationEvent) => {
    switch (event.type) {
      case 'segment-start': {
        const label = `Migrating ${event.segment} (${event.index}/${event.total})`;
        if (spinner) spinner.start(label);
        else
          logger.step(label, {
            taskHandle: event.taskHandle,
            reopened: event.reopened,
            sourceDocuments: event.sourceDocuments,
          });
        return;
      }
      case 'progress': {
        if (!spinner || !event.snapshot.isRunning) return;
        const { itemsDone, totalItems } = event.snapshot;
        spinner.text = `Migrating ${event.segment} (${event.index}/${event.total}): ${itemsDone}/${totalItems} documents`;
        if (!spinner.isSpinning) spinner.start();
        return;
      }
      case 'segment-finished': {
        const text = `Migrated ${event.segment} (${event.index}/${event.total})`;
        if (spinner?.isSpinning) spinner.succeed(text);
        else logger.success(text, { itemsDone: event.snapshot.itemsDone });
        return;
      }
      case 'finalize':
        logger.step(`Finalizing ${event.destination}`);
        return;
      case 'phase':
        return;
    }
  };

  let result: MigrationRunResult;
  try {
    logger.info('Starting migration', {
      source: flags.source,
      destination: flags.dest,
      hosts: reindexer.config.hosts,
      resume: flags.resume,
    });
    result = await reindexer.migrate({
      sourcePattern: flags.source,
      destination: flags.dest,
      resume: flags.resume,
      autoConfirm: flags.yes,
      dryRun: flags.dryRun,
      confirm: promptConfirm,
      signal: controller.signal,
      callbacks: { onEvent },
    });
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    if (spinner?.isSpinning) spinner.stop();
  }

  switch (result.kind) {
    case 'nothing-to-do':
      logger.warn(`No segments match "${result.sourcePattern}"; nothing to do`);
      logger.flush({ command: 'run', result });
      return 0;
    case 'declined':
      logger.warn('Migration declined; nothing was changed');
      logger.flush({ command: 'run', result });
      return 1;
    case 'dry-run':
      logger.info(describePlan(result.checkpoint, result.resumed));
      logger.flush({ command: 'run', result });
      return 0;
    case 'finished': {
      const { outcome } = result;
      if (outcome.status === 'interrupted') {
        logger.warn(
          `Migration interrupted at ${outcome.checkpoint.currentSegment || 'start'}; re-run with --resume to continue`,
          { checkpoint: outcome.checkpoint.id },
        );
        logger.flush({ command: 'run', result });
        return 1;
      }
      logger.success(
        `Migrated ${outcome.segments.length} segment(s) into ${outcome.destination}`,
        {
          documents: formatCount(outcome.documentCount),
          durationMs: outcome.durationMs,
        },
      );
      logger.flush({ command: 'run', result });
      return 0;
    }
  }
}

async function handleStatus(args: string[]): Promise<number> {
  const program = withConnectionOptions(new Command('status').allowExcessArguments(false));
  const parsed = await parseWithCommander(program, args);
  const opts = parsed.opts<{ hosts?: string[]; checkpointIndex?: string }>();

  const reindexer = createReindexer({
    overrides: { hosts: opts.hosts, checkpointCollection: opts.checkpointIndex },
    logger: buildPipelineLogger(),
  });
  const checkpoints = await reindexer.listCheckpoints();

  if (checkpoints.length === 0) {
    logger.info(`No checkpoints in ${reindexer.config.checkpointCollection}`);
  }
  if (!jsonOutput) {
    for (const checkpoint of checkpoints) {
      const status =
        checkpoint.status === 'OK'
          ? pc.green(checkpoint.status)
          : checkpoint.status === 'CRASHED'
            ? pc.red(checkpoint.status)
            : pc.yellow(checkpoint.status);
      console.log(`\n${pc.bold(checkpoint.id)}  ${status}`);
      console.log(`  Destination : ${checkpoint.destination}`);
      console.log(`  Segments    : ${checkpoint.sourceSegments.join(', ')}`);
      console.log(`  Current     : ${checkpoint.currentSegment || '(not started)'}`);
      if (checkpoint.currentTaskHandle) console.log(`  Task        : ${checkpoint.currentTaskHandle}`);
      console.log(`  Message     : ${checkpoint.message}`);
      console.log(`  Owner       : ${checkpoint.host}:${checkpoint.processId}`);
      console.log(`  Last update : ${checkpoint.lastUpdate}`);
    }
  }
  logger.flush({ command: 'status', checkpoints });
  return 0;
}

async function main(): Promise<number> {
  if (envSummary.loadedFiles.length > 0) {
    logger.info('Loaded environment files', { files: envSummary.loadedFiles });
  }
  try {
    if (command === 'run') return await handleRun(rawArgs.slice(1));
    if (command === 'status') return await handleStatus(rawArgs.slice(1));
    if (command === null && (rawArgs.includes('--help') || rawArgs.includes('-h'))) {
      return usage(0);
    }
    if (command !== null) logger.error(`Unknown command "${command}"`);
    return usage(1);
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error(err.message, { name: err.name });
    logger.flush({ command: command ?? 'run', error: { message: err.message, name: err.name } });
    return 1;
  }
}

const exitCode = await main();
if (exitCode !== 0) process.exit(exitCode);
