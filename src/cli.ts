#!/usr/bin/env node
/**
 * Headless circuit runner
 *
 * Usage: analog-patch <circuit.json> [-n steps] [--dt seconds] [-o out.csv] [-q]
 */

import { existsSync, realpathSync, writeFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { Simulator } from './simulator/simulator.js';
import { createDefaultRegistry } from './registry/index.js';
import { DEFAULT_DT } from './simulator/machine.js';
import type { ChannelStats } from './simulator/simulator.js';

const DEFAULT_STEPS = 1000;

interface CliOptions {
  inputFile: string;
  steps: number;
  dt: number;
  outputFile: string | null;
  quiet: boolean;
}

type ParseResult =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'list-types' }
  | { kind: 'error' };

function parseArgs(args: string[]): ParseResult {
  const cliArgs = args.slice(2); // Skip node and script path

  if (cliArgs.length === 0) {
    return { kind: 'error' };
  }

  let inputFile = '';
  let steps = DEFAULT_STEPS;
  let dt = DEFAULT_DT;
  let outputFile: string | null = null;
  let quiet = false;

  for (let i = 0; i < cliArgs.length; i++) {
    const arg = cliArgs[i];

    if (arg === '-n' || arg === '--steps') {
      const value = Number(cliArgs[++i]);
      if (!Number.isInteger(value) || value <= 0) {
        console.error(`Error: ${arg} requires a positive integer`);
        return { kind: 'error' };
      }
      steps = value;
    } else if (arg === '--dt') {
      const value = Number(cliArgs[++i]);
      if (!Number.isFinite(value) || value <= 0) {
        console.error('Error: --dt requires a positive number');
        return { kind: 'error' };
      }
      dt = value;
    } else if (arg === '-o' || arg === '--output') {
      if (i + 1 >= cliArgs.length) {
        console.error(`Error: ${arg} requires an output filename`);
        return { kind: 'error' };
      }
      outputFile = cliArgs[++i];
    } else if (arg === '-q' || arg === '--quiet') {
      quiet = true;
    } else if (arg === '--list-types') {
      return { kind: 'list-types' };
    } else if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    } else if (!arg.startsWith('-')) {
      inputFile = arg;
    } else {
      console.error(`Error: Unknown option '${arg}'`);
      return { kind: 'error' };
    }
  }

  if (!inputFile) {
    console.error('Error: No circuit file specified');
    return { kind: 'error' };
  }

  return { kind: 'run', options: { inputFile, steps, dt, outputFile, quiet } };
}

function printUsage(): void {
  console.log(`Analog Patch circuit runner

Usage: analog-patch <circuit.json> [options]

Options:
  -n, --steps <N>      Number of simulation steps (default: ${DEFAULT_STEPS})
  --dt <seconds>       Timestep in seconds (default: ${DEFAULT_DT})
  -o, --output <file>  Write scope channels to a CSV file
  -q, --quiet          Suppress progress output
  --list-types         List the available component types
  -h, --help           Show this help message

Examples:
  analog-patch circuits/harmonic.json --steps 5000 --output data.csv
  analog-patch circuits/harmonic.json --dt 0.0001 --steps 10000 -q`);
}

function formatSummary(stats: ChannelStats[], time: number, steps: number): string {
  const rule = '-'.repeat(50);
  const lines: string[] = ['', '='.repeat(50), 'Simulation Summary', '='.repeat(50)];

  if (stats.length === 0) {
    lines.push('No data collected (no scope channels defined)');
    return lines.join('\n');
  }

  lines.push('', `Final time: ${time.toFixed(6)}s`, `Total steps: ${steps}`, '');
  lines.push('Channel Results:', rule);
  lines.push(
    `${'Channel'.padEnd(20)} ${'Final'.padStart(10)} ${'Min'.padStart(10)} ${'Max'.padStart(10)}`
  );
  lines.push(rule);
  for (const s of stats) {
    lines.push(
      `${s.label.padEnd(20)} ${s.final.toFixed(4).padStart(10)} ${s.min.toFixed(4).padStart(10)} ${s.max.toFixed(4).padStart(10)}`
    );
  }
  lines.push(rule);
  return lines.join('\n');
}

export function main(args: string[] = process.argv): number {
  const parsed = parseArgs(args);

  if (parsed.kind === 'help' || parsed.kind === 'error') {
    printUsage();
    return parsed.kind === 'help' ? 0 : 1;
  }

  if (parsed.kind === 'list-types') {
    for (const type of createDefaultRegistry().listTypes()) {
      console.log(type);
    }
    return 0;
  }

  const options = parsed.options;
  const log = (message: string): void => {
    if (!options.quiet) console.log(message);
  };

  log(`Loading circuit from ${options.inputFile}...`);

  let sim: Simulator;
  try {
    sim = Simulator.fromFile(options.inputFile, { dt: options.dt });
    sim.startRecording();
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    console.error(`Error loading circuit: ${message}`);
    return 1;
  }

  const labels = sim.getLabels();
  log(`Circuit: ${sim.circuit.name}`);
  if (sim.circuit.description) {
    log(`Description: ${sim.circuit.description}`);
  }
  log(`Components: ${sim.machine.components.length}`);
  log(`Patches: ${sim.patchBay.size}`);
  log(`Scope channels: ${labels.length}`);
  log(`Running ${options.steps} steps with dt=${options.dt}s...`);

  const progressInterval = Math.max(1, Math.floor(options.steps / 10));
  for (let step = 0; step < options.steps; step++) {
    sim.tick();
    if ((step + 1) % progressInterval === 0) {
      const percent = ((step + 1) / options.steps) * 100;
      log(`  Progress: ${percent.toFixed(0)}% (${step + 1}/${options.steps} steps)`);
    }
  }
  const samples = sim.stopRecording();
  log('Simulation complete.');

  if (options.outputFile) {
    try {
      writeFileSync(options.outputFile, sim.exportCSV(samples));
    } catch (e) {
      const message = e instanceof Error ? e.message : String(e);
      console.error(`Error: Cannot write file: ${options.outputFile} (${message})`);
      return 1;
    }
    log(`Results written to ${options.outputFile}`);
  } else {
    console.log(formatSummary(sim.getStats(samples), sim.time, sim.getCycle()));
  }

  return 0;
}

// Run if executed directly
function isEntryPoint(): boolean {
  const script = process.argv[1];
  return (
    script !== undefined &&
    existsSync(script) &&
    realpathSync(script) === fileURLToPath(import.meta.url)
  );
}

if (isEntryPoint()) {
  process.exit(main());
}
