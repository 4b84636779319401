// Patch bay: directed edges from output ports to input ports

import { Port } from './signal.js';

export interface Connection {
  source: Port;
  dest: Port;
}

function edgeKey(source: Port, dest: Port): string {
  return `${source.id}->${dest.id}`;
}

/**
 * Ordered, de-duplicated set of patch cables.
 *
 * Fan-out (one source, many destinations) is the normal case. Fan-in is allowed
 * too: when several edges share a destination, propagate() writes them in
 * insertion order and the last one wins for that call.
 */
export class PatchBay {
  private connections: Connection[] = [];
  private keys: Set<string> = new Set();

  /**
   * Add an edge unless the same (source, dest) pair is already present
   */
  connect(source: Port, dest: Port): void {
    const key = edgeKey(source, dest);
    if (this.keys.has(key)) {
      return;
    }
    this.keys.add(key);
    this.connections.push({ source, dest });
  }

  /**
   * Remove an exact (source, dest) edge; no-op if absent
   */
  disconnect(source: Port, dest: Port): void {
    const key = edgeKey(source, dest);
    if (!this.keys.delete(key)) {
      return;
    }
    const index = this.connections.findIndex(
      (c) => c.source.id === source.id && c.dest.id === dest.id
    );
    this.connections.splice(index, 1);
  }

  clear(): void {
    this.connections = [];
    this.keys.clear();
  }

  isConnected(source: Port, dest: Port): boolean {
    return this.keys.has(edgeKey(source, dest));
  }

  /**
   * Copy every source value into its destination, in insertion order
   */
  propagate(): void {
    for (const { source, dest } of this.connections) {
      dest.write(source.read());
    }
  }

  /**
   * Edges in insertion order (a copy; mutating it does not rewire anything)
   */
  getConnections(): Connection[] {
    return this.connections.map((c) => ({ source: c.source, dest: c.dest }));
  }

  get size(): number {
    return this.connections.length;
  }
}

export function createPatchBay(): PatchBay {
  return new PatchBay();
}
