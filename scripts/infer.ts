#!/usr/bin/env npx tsx
/**
 * CLI for single-image inference (JPEG and/or tensor endpoint)
 */
import path from 'path';
import dotenv from 'dotenv';
import { countLabels } from '../src/lib/aggregate';
import { annotateDetections } from '../src/lib/annotator';
import { filterByConfidence } from '../src/lib/batch';
import { InferenceClient } from '../src/lib/client';
import { ConfigError, loadDefaults, parseChoice, parseNumber, requireValue } from '../src/lib/config';
import { logErrorDetails } from '../src/lib/errors';
import { letterbox } from '../src/lib/preprocess';
import { formatDetection, sortCounts } from '../src/lib/summary';
import type { Detection } from '../src/lib/types';

dotenv.config();

const DEFAULTS = loadDefaults();
const MODES = ['jpeg', 'tensor', 'both'] as const;

type InferCLIConfig = {
  imagePath: string;
  host: string;
  username: string | undefined;
  password: string | undefined;
  mode: (typeof MODES)[number];
  index: number;
  confidence: number;
  timeoutMs: number;
  annotatedOutput: string | null;
  debug: boolean;
};

function printHelp() {
  console.log(`
Usage: npx tsx scripts/infer.ts <image> [options]

Runs JPEG and/or tensor inference on one image (JPEG, PNG, WebP, ...).

Options:
  -H, --host <ip>                 Camera IP or hostname (default: ${DEFAULTS.host})
  -u, --username <user>           Digest auth username
  -p, --password <pass>           Digest auth password
  -m, --mode <mode>               jpeg|tensor|both (default: both)
  -i, --index <n>                 Image index sent to the server (default: 0)
  -c, --confidence <c>            Minimum confidence 0.0-1.0 (default: ${DEFAULTS.confidence})
      --timeout <ms>              Request timeout (default: ${DEFAULTS.timeoutMs})
      --annotated-output <path>   Write the image with JPEG-mode boxes drawn on it
      --debug                     Verbose client logging
  -h, --help                      Show help
`);
}

function parseArgs(args: string[]): InferCLIConfig {
  const config: InferCLIConfig = {
    imagePath: '',
    host: DEFAULTS.host,
    username: DEFAULTS.username,
    password: DEFAULTS.password,
    mode: DEFAULTS.mode ? parseChoice(DEFAULTS.mode, 'DETECTX_MODE', MODES) : 'both',
    index: 0,
    confidence: DEFAULTS.confidence,
    timeoutMs: DEFAULTS.timeoutMs,
    annotatedOutput: null,
    debug: false,
  };

  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-H':
      case '--host':
        config.host = requireValue(args, i, arg);
        i++;
        break;
      case '-u':
      case '--username':
        config.username = requireValue(args, i, arg);
        i++;
        break;
      case '-p':
      case '--password':
        config.password = requireValue(args, i, arg);
        i++;
        break;
      case '-m':
      case '--mode':
        config.mode = parseChoice(requireValue(args, i, arg), arg, MODES);
        i++;
        break;
      case '-i':
      case '--index':
        config.index = parseNumber(requireValue(args, i, arg), arg, { integer: true });
        i++;
        break;
      case '-c':
      case '--confidence':
        config.confidence = parseNumber(requireValue(args, i, arg), arg, { min: 0, max: 1 });
        i++;
        break;
      case '--timeout':
        config.timeoutMs = parseNumber(requireValue(args, i, arg), arg, { min: 1 });
        i++;
        break;
      case '--annotated-output':
        config.annotatedOutput = requireValue(args, i, arg);
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
    throw new ConfigError('No input image specified.');
  }
  config.imagePath = positionalArgs[0];

  return config;
}

function printDetections(detections: Detection[], confidence: number) {
  console.log(`Found ${detections.length} objects (confidence >= ${(confidence * 100).toFixed(0)}%):`);
  for (const det of detections) {
    console.log(`  - ${formatDetection(det)}`);
  }
  if (detections.length > 0) {
    console.log('\nLabel Summary:');
    for (const [label, count] of sortCounts(countLabels(detections))) {
      console.log(`  ${label}: ${count}`);
    }
  }
  console.log('');
}

async function main() {
  let config: InferCLIConfig;
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
    console.log('=== Server Capabilities ===');
    const capabilities = await client.getCapabilities();
    const { model } = capabilities;
    console.log(`Model: ${model.input_width}x${model.input_height}`);
    console.log(`Classes: ${model.classes.length}`);
    console.log(`Formats: ${model.input_formats.map((f) => f.endpoint).join(', ')}`);
    console.log('');

    console.log('=== Server Health ===');
    const health = await client.getHealth();
    console.log(`Running: ${health.running}`);
    console.log(`Queue size: ${health.queue_size}`);
    console.log(`Total requests: ${health.statistics.total_requests}`);
    console.log('');

    if (config.mode === 'jpeg' || config.mode === 'both') {
      console.log('=== JPEG Inference ===');
      const start = Date.now();
      const detections = filterByConfidence(
        await client.inferJpeg(config.imagePath, config.index),
        config.confidence
      );
      console.log(`Inference time: ${(Date.now() - start).toFixed(1)} ms`);
      printDetections(detections, config.confidence);

      if (config.annotatedOutput) {
        await annotateDetections({
          image: config.imagePath,
          detections,
          outputPath: config.annotatedOutput,
        });
        console.log(`🖼️ Annotated image written to ${path.relative(process.cwd(), config.annotatedOutput)}\n`);
      }
    }

    if (config.mode === 'tensor' || config.mode === 'both') {
      console.log('=== Tensor Inference ===');
      const preprocessStart = Date.now();
      const tensor = await letterbox(config.imagePath, {
        width: model.input_width,
        height: model.input_height,
      });
      const preprocessMs = Date.now() - preprocessStart;
      console.log(`Preprocessed tensor shape: (${tensor.shape.join(', ')})`);
      console.log(`Preprocessing time: ${preprocessMs.toFixed(1)} ms`);

      const inferenceStart = Date.now();
      const detections = filterByConfidence(
        await client.inferTensor(tensor, config.index),
        config.confidence
      );
      const inferenceMs = Date.now() - inferenceStart;
      console.log(`Inference time: ${inferenceMs.toFixed(1)} ms`);
      console.log(`Total time: ${(preprocessMs + inferenceMs).toFixed(1)} ms`);
      printDetections(detections, config.confidence);
    }
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
