#!/usr/bin/env node
import { createProgressPrinter, runInspection } from '../src/cli/commands';
import { CliParser } from '../src/cli/parser';
import { loadConfig } from '../src/utils/config';
import { setLogLevel } from '../src/utils/logger';

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0) {
    CliParser.printHelp();
    process.exit(0);
  }

  try {
    const options = CliParser.parse(args);
    if (options.help) {
      CliParser.printHelp();
      return;
    }

    const config = loadConfig(process.env);
    setLogLevel(options.verbose ? 'debug' : config.logLevel);

    await runInspection(
      {
        ...options,
        output: options.output ?? config.report.outputDir,
        shardSize: options.shardSize ?? config.report.shardSize,
        step: options.step ?? config.probe.step,
        maxAttempts: options.maxAttempts ?? config.probe.maxAttempts,
      },
      {
        onProgress: createProgressPrinter(process.stderr),
        leadingBytes: config.probe.leadingBytes,
        concurrency: config.report.concurrency,
      }
    );
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

void main();
