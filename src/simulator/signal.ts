// Signal cells and the named ports that carry them

export type PortId = number;

/**
 * A single mutable scalar value cell.
 */
export class Signal {
  private value: number;

  constructor(initialValue: number = 0) {
    this.value = initialValue;
  }

  read(): number {
    return this.value;
  }

  write(value: number): void {
    this.value = value;
  }
}

let nextPortId: PortId = 0;

/**
 * Named input or output terminal.
 *
 * Each port gets a unique id at construction; the patch bay keys edges on these
 * ids, so two ports are the same endpoint only if they are the same port.
 * Ports own a fresh Signal unless the caller passes one in to share it.
 */
export class Port {
  readonly id: PortId;
  readonly name: string;
  readonly signal: Signal;

  constructor(name: string, signal: Signal = new Signal()) {
    this.id = nextPortId++;
    this.name = name;
    this.signal = signal;
  }

  read(): number {
    return this.signal.read();
  }

  write(value: number): void {
    this.signal.write(value);
  }
}

// Insertion-ordered: enumerated ports (in0..inN, a0..aN) keep their order
export type PortMap = Map<string, Port>;

export type PortDirection = 'inputs' | 'outputs';
