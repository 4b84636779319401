// Machine: the simulation clock

import type { Component } from '../components/component.js';

export const DEFAULT_DT = 0.001;

/**
 * Owns the ordered component list and global time.
 *
 * Components are stepped in registration order, not data-dependency order. A
 * component never sees outputs produced later in the same tick; values cross
 * patch cables only when the patch bay propagates. The canonical tick is
 * therefore `patchBay.propagate()` followed by `machine.step()`, and stepping
 * twice without a propagate in between leaves the wiring one tick stale.
 */
export class Machine {
  time: number = 0;
  private timestep: number;
  private readonly list: Component[] = [];

  constructor(dt: number = DEFAULT_DT) {
    this.timestep = Machine.checkTimestep(dt);
  }

  get dt(): number {
    return this.timestep;
  }

  set dt(value: number) {
    this.timestep = Machine.checkTimestep(value);
  }

  get components(): readonly Component[] {
    return this.list;
  }

  add<T extends Component>(component: T): T {
    this.list.push(component);
    return component;
  }

  findComponent(name: string): Component | undefined {
    return this.list.find((c) => c.name === name);
  }

  /**
   * Advance time by dt, then step every component once
   */
  step(): void {
    this.time += this.timestep;
    for (const component of this.list) {
      component.step(this.timestep);
    }
  }

  reset(): void {
    this.time = 0;
    for (const component of this.list) {
      component.reset();
    }
  }

  private static checkTimestep(dt: number): number {
    if (!Number.isFinite(dt) || dt <= 0) {
      throw new RangeError(`Timestep must be a positive number, got ${dt}`);
    }
    return dt;
  }
}

export function createMachine(dt: number = DEFAULT_DT): Machine {
  return new Machine(dt);
}
