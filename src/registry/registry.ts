// Component registry: type name -> primitive factory or subcircuit template

import type { Component } from '../components/component.js';
import type { Machine } from '../simulator/machine.js';
import type { PatchBay } from '../simulator/patch-bay.js';
import type { ParamRecord, SubcircuitDef } from '../types/circuit.js';
import {
  DuplicateComponentError,
  DuplicateRegistrationError,
  InvalidParamsError,
  MissingContextError,
  TemplateCycleError,
  UnknownTypeError,
} from '../types/errors.js';
import { PRIMITIVES, isPrimitiveType, validateParams } from './primitives.js';
import { SubcircuitComponent } from '../elaborator/subcircuit.js';

// Templates are frozen copies; nothing reachable from one may change
export type SubcircuitTemplate = Readonly<SubcircuitDef>;

/**
 * What a subcircuit needs to attach its flattened internals
 */
export interface BuildContext {
  machine: Machine;
  patchBay: PatchBay;
  // Template names currently being expanded, outermost first
  chain?: string[];
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * An explicit catalog of component types. Registries are values passed to
 * whatever builds circuits; there is no process-wide instance.
 *
 * `extend()` makes a child scope that sees every type of its parent and can
 * register more templates. A child template may shadow a parent template of
 * the same name, never a primitive.
 */
export class ComponentRegistry {
  private readonly templates: Map<string, SubcircuitTemplate> = new Map();

  constructor(private readonly parent?: ComponentRegistry) {}

  extend(): ComponentRegistry {
    return new ComponentRegistry(this);
  }

  /**
   * Register a subcircuit template under `name`.
   * Rejects names already taken in this scope and templates that would
   * expand into themselves.
   */
  register(name: string, definition: SubcircuitDef): void {
    if (isPrimitiveType(name) || this.templates.has(name)) {
      throw new DuplicateRegistrationError(name);
    }

    const local = new Set<string>();
    for (const decl of definition.components) {
      if (local.has(decl.name)) {
        throw new DuplicateComponentError(`${name}.${decl.name}`);
      }
      local.add(decl.name);
    }

    const cycle = this.findCycle(name, definition);
    if (cycle) {
      throw new TemplateCycleError(cycle);
    }

    this.templates.set(name, deepFreeze(structuredClone(definition)));
  }

  has(typeName: string): boolean {
    return isPrimitiveType(typeName) || this.getTemplate(typeName) !== undefined;
  }

  isSubcircuit(typeName: string): boolean {
    return this.getTemplate(typeName) !== undefined;
  }

  getTemplate(typeName: string): SubcircuitTemplate | undefined {
    return this.templates.get(typeName) ?? this.parent?.getTemplate(typeName);
  }

  /**
   * Build a component of `typeName` named `instanceName`.
   *
   * Primitives are returned unattached; the caller adds them to a machine.
   * Templates are expanded into `context.machine` and `context.patchBay`, and
   * the returned wrapper exposes the subcircuit's ports.
   */
  create(
    typeName: string,
    instanceName: string,
    params: ParamRecord = {},
    context?: BuildContext
  ): Component {
    const template = this.getTemplate(typeName);
    if (template) {
      if (!context) {
        throw new MissingContextError(typeName);
      }
      if (Object.keys(params).length > 0) {
        throw new InvalidParamsError(typeName, 'subcircuits take no parameters');
      }
      return new SubcircuitComponent(instanceName, typeName, template, this, context);
    }

    if (!isPrimitiveType(typeName)) {
      throw new UnknownTypeError(typeName);
    }
    validateParams(typeName, params);
    return PRIMITIVES[typeName].create(instanceName, params);
  }

  listTypes(): string[] {
    const names = new Set<string>(Object.keys(PRIMITIVES));
    for (const name of this.templateNames()) {
      names.add(name);
    }
    return [...names].sort();
  }

  private templateNames(): string[] {
    const inherited = this.parent?.templateNames() ?? [];
    return [...inherited, ...this.templates.keys()];
  }

  /**
   * Depth-first walk through the visible templates looking for a path back to
   * `name`. Types that are not registered yet are skipped; a cycle through
   * them is caught when the closing template is registered.
   */
  private findCycle(name: string, definition: SubcircuitDef): string[] | null {
    const visited = new Set<string>();

    const walk = (def: SubcircuitDef, path: string[]): string[] | null => {
      for (const decl of def.components) {
        if (decl.type === name) {
          return [...path, name];
        }
        if (visited.has(decl.type)) {
          continue;
        }
        visited.add(decl.type);
        const inner = this.getTemplate(decl.type);
        if (inner) {
          const found = walk(inner, [...path, decl.type]);
          if (found) return found;
        }
      }
      return null;
    };

    return walk(definition, [name]);
  }
}
