// Main simulation driver

import { buildCircuit, type BuildOptions, type BuiltCircuit } from '../circuit/builder.js';
import { loadCircuitFile } from '../circuit/document.js';
import type { ChannelDecl, CircuitDecl, PortRef } from '../types/circuit.js';
import type { Machine } from './machine.js';
import type { PatchBay } from './patch-bay.js';
import type { Port } from './signal.js';

export type SimulatorOptions = BuildOptions;

export interface ScopeSample {
  step: number;
  time: number;
  values: number[];
}

export interface ChannelStats {
  label: string;
  final: number;
  min: number;
  max: number;
}

interface WatchedChannel {
  label: string;
  port: Port;
}

function csvField(value: string): string {
  return /[",\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/**
 * Runs the canonical tick (propagate, then step) over a built circuit and
 * records scope channels.
 */
export class Simulator {
  readonly circuit: BuiltCircuit;
  private cycle: number = 0;

  // Scope recording
  private recording: boolean = false;
  private samples: ScopeSample[] = [];
  private watched: WatchedChannel[] = [];

  constructor(circuit: BuiltCircuit) {
    this.circuit = circuit;
  }

  static fromCircuit(decl: CircuitDecl, options: SimulatorOptions = {}): Simulator {
    return new Simulator(buildCircuit(decl, options));
  }

  /**
   * Load a JSON circuit file (imports included) and build it
   */
  static fromFile(file: string, options: SimulatorOptions = {}): Simulator {
    return Simulator.fromCircuit(loadCircuitFile(file), options);
  }

  get machine(): Machine {
    return this.circuit.machine;
  }

  get patchBay(): PatchBay {
    return this.circuit.patchBay;
  }

  get time(): number {
    return this.circuit.machine.time;
  }

  getCycle(): number {
    return this.cycle;
  }

  /**
   * Drive an input port directly. The value holds until a patch cable
   * targeting the same port overwrites it on the next propagate.
   */
  setInput(ref: PortRef, value: number): void {
    this.circuit.builder.resolvePort(ref, 'inputs').write(value);
  }

  /**
   * Current value at a port (outputs take precedence over inputs)
   */
  probe(ref: PortRef): number {
    return this.circuit.builder.findPort(ref).read();
  }

  /**
   * One tick: move last tick's outputs across the patch cables, then step
   */
  tick(): void {
    this.circuit.patchBay.propagate();
    this.circuit.machine.step();

    if (this.recording) {
      this.record();
    }
    this.cycle++;
  }

  run(ticks: number): void {
    for (let i = 0; i < ticks; i++) {
      this.tick();
    }
  }

  reset(): void {
    this.circuit.machine.reset();
    this.cycle = 0;
    this.samples = [];
  }

  // Scope recording

  /**
   * Start recording the given channels (the circuit's scope by default).
   * Every channel source must resolve.
   */
  startRecording(channels: ChannelDecl[] = this.circuit.channels): void {
    this.watched = channels.map((channel) => ({
      label: channel.label ?? channel.source,
      port: this.circuit.builder.findPort(channel.source),
    }));
    this.samples = [];
    this.recording = true;
  }

  stopRecording(): ScopeSample[] {
    this.recording = false;
    return this.samples;
  }

  getLabels(): string[] {
    return this.watched.map((w) => w.label);
  }

  private record(): void {
    this.samples.push({
      step: this.cycle,
      time: this.circuit.machine.time,
      values: this.watched.map((w) => w.port.read()),
    });
  }

  /**
   * Export samples as CSV: step,time,<channel labels>
   */
  exportCSV(samples: ScopeSample[] = this.samples): string {
    const lines: string[] = [];
    lines.push(['step', 'time', ...this.getLabels()].map(csvField).join(','));
    for (const sample of samples) {
      lines.push([sample.step, sample.time, ...sample.values].map(String).join(','));
    }
    return lines.join('\n') + '\n';
  }

  /**
   * Final, min and max per recorded channel
   */
  getStats(samples: ScopeSample[] = this.samples): ChannelStats[] {
    return this.watched.map((w, i) => {
      if (samples.length === 0) {
        return { label: w.label, final: 0, min: 0, max: 0 };
      }
      let min = Infinity;
      let max = -Infinity;
      for (const sample of samples) {
        min = Math.min(min, sample.values[i]);
        max = Math.max(max, sample.values[i]);
      }
      return {
        label: w.label,
        final: samples[samples.length - 1].values[i],
        min,
        max,
      };
    });
  }

  listComponents(): string[] {
    return this.circuit.machine.components.map((c) => c.name);
  }
}
