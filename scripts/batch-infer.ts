#!/usr/bin/env npx tsx
/**
 * CLI for batch inference over a directory of images
 */
import dotenv from 'dotenv';
import { discoverImages, runBatch, writeReport } from '../src/lib/batch';
import { InferenceClient } from '../src/lib/client';
import { ConfigError, loadDefaults, parseChoice, parseNumber, requireValue } from '../src/lib/config';
import { formatError, logErrorDetails } from '../src/lib/errors';
import type { Size } from '../src/lib/preprocess';
import { formatSummary } from '../src/lib/summary';
import type { InferenceMode } from '../src/lib/types';

dotenv.config();

const DEFAULTS = loadDefaults();
const MODES = ['jpeg', 'tensor'] as const;

type BatchCLIConfig = {
  target: string;
  host: string;
  username: string | undefined;
  password: string | undefined;
  mode: InferenceMode;
  workers: number;
  maxRetries: number;
  timeoutMs: number;
  confidence: number;
  outputFile: string | null;
  debug: boolean;
};

function printHelp() {
  console.log(`
Usage: npx tsx scripts/batch-infer.ts <image_directory|image> [options]

Options:
      --host <ip>           Camera IP or hostname (default: ${DEFAULTS.host})
      --username <user>     Digest auth username
      --password <pass>     Digest auth password
      --mode <mode>         jpeg|tensor (default: jpeg)
      --workers <n>         Parallel workers, match the server queue (default: ${DEFAULTS.workers})
      --max-retries <n>     Attempts per image when the server is busy (default: ${DEFAULTS.maxRetries})
      --timeout <ms>        Request timeout (default: ${DEFAULTS.timeoutMs})
      --confidence <c>      Minimum confidence 0.0-1.0 (default: ${DEFAULTS.confidence})
  -o, --output <file>       Write the JSON report here
      --debug               Verbose pool/client logging
  -h, --help                Show help

Example:
  npx tsx scripts/batch-infer.ts ./images --output results.json --workers 3
`);
}

function parseArgs(args: string[]): BatchCLIConfig {
  const config: BatchCLIConfig = {
    target: '',
    host: DEFAULTS.host,
    username: DEFAULTS.username,
    password: DEFAULTS.password,
    mode: DEFAULTS.mode ? parseChoice(DEFAULTS.mode, 'DETECTX_MODE', MODES) : 'jpeg',
    workers: DEFAULTS.workers,
    maxRetries: DEFAULTS.maxRetries,
    timeoutMs: DEFAULTS.timeoutMs,
    confidence: DEFAULTS.confidence,
    outputFile: null,
    debug: false,
  };

  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--host':
        config.host = requireValue(args, i, arg);
        i++;
        break;
      case '--username':
        config.username = requireValue(args, i, arg);
        i++;
        break;
      case '--password':
        config.password = requireValue(args, i, arg);
        i++;
        break;
      case '--mode':
        config.mode = parseChoice(requireValue(args, i, arg), arg, MODES);
        i++;
        break;
      case '--workers':
        config.workers = parseNumber(requireValue(args, i, arg), arg, { min: 1, max: 32, integer: true });
        i++;
        break;
      case '--max-retries':
        config.maxRetries = parseNumber(requireValue(args, i, arg), arg, { min: 1, max: 20, integer: true });
        i++;
        break;
      case '--timeout':
        config.timeoutMs = parseNumber(requireValue(args, i, arg), arg, { min: 1 });
        i++;
        break;
      case '--confidence':
        config.confidence = parseNumber(requireValue(args, i, arg), arg, { min: 0, max: 1 });
        i++;
        break;
      case '-o':
      case '--output':
        config.outputFile = requireValue(args, i, arg);
        i++;
        break;
      case '--debug':
        config.debug = true;
        break;
      case '-h':
      case '--help':
        printHelp();
        process.exit(0);
      default:
        if (arg.startsWith('-')) {
          console.warn(`⚠️ Unknown argument ignored: ${arg}`);
        } else {
          positionalArgs.push(arg);
        }
    }
  }

  if (positionalArgs.length === 0) {
    printHelp();
    throw new ConfigError('No image directory specified.');
  }
  config.target = positionalArgs[0];

  return config;
}

async function main() {
  let config: BatchCLIConfig;
  try {
    config = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  const client = new InferenceClient({
    host: config.host,
    username: config.username,
    password: config.password,
    timeoutMs: config.timeoutMs,
    debug: config.debug,
  });

  try {
    // Unreachable host or missing images abort the run before any work starts
    try {
      const health = await client.getHealth();
      console.log(`🩺 Server running: ${health.running}, queue size: ${health.queue_size}`);
    } catch (error) {
      console.error(`❌ Cannot reach inference server at ${client.baseUrl}`);
      console.error(`   ${formatError(error)}`);
      process.exitCode = 1;
      return;
    }

    let tensorSize: Size | undefined;
    if (config.mode === 'tensor') {
      const capabilities = await client.getCapabilities();
      tensorSize = { width: capabilities.model.input_width, height: capabilities.model.input_height };
      console.log(`📐 Tensor input: ${tensorSize.width}x${tensorSize.height}`);
    }

    const tasks = await discoverImages(config.target);
    if (tasks.length === 0) {
      console.error(`❌ No images found in ${config.target}`);
      process.exitCode = 1;
      return;
    }

    console.log(`🚀 Processing ${tasks.length} images with ${config.workers} workers (${config.mode})...`);

    const report = await runBatch(client, tasks, {
      mode: config.mode,
      tensorSize,
      numWorkers: config.workers,
      maxRetries: config.maxRetries,
      minConfidence: config.confidence,
      debug: config.debug,
      onRetry: (task, info) => {
        if (config.debug) {
          console.warn(`↪ ${task.source_path} busy, retrying in ${info.delayMs}ms (attempt ${info.attempt})`);
        }
      },
      onProgress: ({ completed, successful, total, outcome }) => {
        const status = outcome.success ? '✅' : '❌';
        const pct = ((completed / total) * 100).toFixed(0);
        console.log(
          `${status} [${completed}/${total} ${pct}%] ${outcome.source_name} | Success: ${successful}/${completed}`
        );
      },
    });

    console.log('');
    for (const line of formatSummary(report)) {
      console.log(line);
    }

    if (config.outputFile) {
      await writeReport(report, config.outputFile);
      console.log(`\n🧾 Results saved to ${config.outputFile}`);
    }

    console.log(`\n🎉 Done!`);
  } catch (error) {
    logErrorDetails('❌ ', error);
    process.exitCode = 1;
  } finally {
    client.close();
  }
}

main().catch((error) => {
  logErrorDetails('❌ ', error);
  process.exit(1);
});
