#!/usr/bin/env node
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import process from 'node:process';

import { loadRunConfigFromJson, requireRunConfig } from '../config/loader.js';
import { formatRecordsCsv } from '../encoding/timeSeries.js';
import { parseHexAsInteger } from '../plm/hex.js';
import { createTransformInputs } from '../plm/inputs.js';
import { evaluateInputs, resolveRunConfig, runTimeSeries } from '../runtime/services.js';
import { startRecordBroadcaster, type RecordBroadcaster } from '../telemetry/broadcast.js';
import { parseRunArgs, parseValueArgs } from './utils/args.js';
import { formatCliError } from './utils/errors.js';

function exitWithError(message: string): never {
  console.error(message);
  process.exit(1);
}

const printMainUsage = () => {
  console.log(`plm – evaluate and sequence the PLM transform

Commands:
  value --config <file> | --pi --lambda --mu --x --hash --block-size --crc [--json]
  run [--config <file>] [--steps 20] [--oracle sampled|analytic] [--format csv|json] [--output <file>]
  config validate <config.json> [--json] [--verbose]
  hex <text>

Run "plm <command> --help" to learn more about a command.`);
};

const printValueUsage = () => {
  console.log(`plm value

Compute S = ((pi * y) * (lambda * x)) / (mu * C) once.

Inputs (either a run config or all seven flags):
  --config <file>        Run config JSON supplying the inputs
  --pi <decimal>         pi
  --lambda <decimal>     lambda
  --mu <decimal>         mu (non-zero)
  --x <integer>          x
  --hash <hex>           hash string; y is its hex value
  --block-size <int>     block size
  --crc <int>            CRC value; C = block size + CRC must be positive

Optional:
  --json                 Emit the derived values as JSON
`);
};

const printRunUsage = () => {
  console.log(`plm run

Step the sequencer, encode each S as a rotation angle and record P(1).

Inputs: --config <file>, or the seven inline flags from "plm value --help".

Optional:
  --steps <count>        Records to produce (default 20)
  --scale <number>       Angle scale factor (default 1)
  --shots <count>        Shots per oracle call (default 2000)
  --oracle <kind>        sampled or analytic (default sampled)
  --seed <number>        Seed for the sampled oracle (default 1337)
  --format <csv|json>    Output format (default csv)
  --json                 Same as --format json
  --output <path>        Write the output to a file instead of stdout
  --broadcast <port>     Stream records over WebSocket while running
  --interval <ms>        Pause between steps (useful with --broadcast)

Example:
  plm run --config examples/configs/quantum-temporal.json --steps 20 --output series.csv
`);
};

const printConfigUsage = () => {
  console.log(`plm config – run config utilities

Usage:
  plm config validate <config.json> [--json] [--verbose]
`);
};

const wantsHelp = (args: readonly string[]) => args.includes('--help') || args.includes('-h');

const handleValueCommand = async (args: string[]) => {
  if (wantsHelp(args)) {
    printValueUsage();
    return;
  }
  const options = parseValueArgs(args);
  const inputs = options.config
    ? (await requireRunConfig(options.config)).inputs
    : options.inputs && createTransformInputs(options.inputs);
  if (!inputs) {
    exitWithError('value requires --config <file> or the inline input flags.');
  }
  const summary = evaluateInputs(inputs);
  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return;
  }
  console.log(`y     = ${summary.y}`);
  console.log(`C     = ${summary.c}`);
  console.log(`ratio = ${summary.ratio}`);
  console.log(`S     = ${summary.value}`);
};

const handleRunCommand = async (args: string[]) => {
  if (wantsHelp(args)) {
    printRunUsage();
    return;
  }
  const options = parseRunArgs(args);
  const config = await resolveRunConfig(
    options.config,
    options.inputs && createTransformInputs(options.inputs),
    options.overrides,
  );

  let broadcaster: RecordBroadcaster | undefined;
  if (options.broadcast !== undefined) {
    broadcaster = await startRecordBroadcaster({ port: options.broadcast });
  }

  try {
    const summary = await runTimeSeries(config, {
      intervalMs: options.interval,
      onRecord: broadcaster
        ? (record) => broadcaster?.publish(config.metadata.name, record)
        : undefined,
    });
    broadcaster?.send({
      type: 'done',
      run: summary.name,
      steps: summary.steps,
      digest: summary.digest,
    });

    const body =
      options.format === 'json'
        ? JSON.stringify(summary, null, 2)
        : formatRecordsCsv(summary.records);
    if (options.output) {
      const target = resolve(process.cwd(), options.output);
      await writeFile(target, `${body}\n`, 'utf8');
      console.log(`[run] ${summary.name}: ${summary.steps} records written to ${target}`);
      console.log(`[run] digest ${summary.digest}`);
    } else {
      console.log(body);
    }
  } finally {
    await broadcaster?.close();
  }
};

const handleConfigCommand = async (args: string[]) => {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printConfigUsage();
    return;
  }
  const [subcommand, ...rest] = args;
  if (subcommand !== 'validate') {
    exitWithError(`Unknown config subcommand "${subcommand}".`);
  }
  const flags = new Set(rest.filter((arg) => arg.startsWith('--')));
  const configPath = rest.find((arg) => !arg.startsWith('--'));
  if (!configPath) {
    exitWithError('config validate requires a config path.');
  }
  const payload = await readFile(resolve(process.cwd(), configPath), 'utf8');
  const result = loadRunConfigFromJson(payload, configPath);
  const warnings =
    result.issues?.filter((issue) => issue.severity === 'warning') ?? [];

  if (result.kind === 'success') {
    if (flags.has('--json')) {
      console.log(
        JSON.stringify(
          {
            status: 'ok',
            config: {
              name: result.config.metadata.name,
              schemaVersion: result.config.schemaVersion,
              rules: result.config.rules.length,
              steps: result.config.run.steps,
            },
            warnings,
          },
          null,
          2,
        ),
      );
      return;
    }
    console.log(`✔ Run config valid: ${configPath}`);
    console.log(`  schema: ${result.config.schemaVersion}`);
    console.log(`  name:   ${result.config.metadata.name}`);
    console.log(`  rules:  ${result.config.rules.map((rule) => rule.kind).join(', ') || 'none'}`);
    console.log(
      `  run:    ${result.config.run.steps} steps, ${result.config.run.oracle} oracle, ${result.config.run.shots} shots`,
    );
    if (warnings.length > 0 && flags.has('--verbose')) {
      console.warn('Warnings:');
      warnings.forEach((issue) => {
        console.warn(`  • ${issue.message} (${issue.code})`);
      });
    }
    return;
  }

  if (flags.has('--json')) {
    console.log(
      JSON.stringify({ status: 'error', message: result.message, issues: result.issues }, null, 2),
    );
  } else {
    console.error(`✖ Run config invalid: ${configPath}`);
    console.error(`  ${result.message}`);
    result.issues
      ?.filter((issue) => issue.severity === 'error')
      .forEach((issue) => {
        console.error(`  • ${issue.message} (${issue.code})`);
      });
  }
  process.exit(1);
};

const handleHexCommand = (args: string[]) => {
  const [text] = args;
  if (text === undefined || text === '--help' || text === '-h') {
    console.log('Usage: plm hex <text>\n\nPrint the base-10 value of a hex string (optional 0x prefix).');
    return;
  }
  console.log(parseHexAsInteger(text).toString());
};

const main = async () => {
  const [, , ...argv] = process.argv;
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    printMainUsage();
    process.exit(0);
  }
  const [command, ...rest] = argv;
  switch (command) {
    case 'value':
      await handleValueCommand(rest);
      break;
    case 'run':
      await handleRunCommand(rest);
      break;
    case 'config':
      await handleConfigCommand(rest);
      break;
    case 'hex':
      handleHexCommand(rest);
      break;
    default:
      exitWithError(`Unknown command "${command}".`);
  }
};

main().catch((error: unknown) => {
  formatCliError(error).forEach((line) => console.error(line));
  process.exit(1);
});
