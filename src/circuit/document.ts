// Circuit documents: validate parsed JSON, load files with imports, write files

import { readFileSync, writeFileSync } from 'fs';
import { basename, dirname, extname, isAbsolute, join } from 'path';
import type {
  ChannelDecl,
  CircuitDecl,
  ComponentDecl,
  ParamRecord,
  ParamValue,
  PatchDecl,
  Point,
  ScopeDecl,
  SubcircuitDef,
} from '../types/circuit.js';
import { CircuitFormatError, DuplicateRegistrationError } from '../types/errors.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function at(path: string, key: string | number): string {
  if (typeof key === 'number') return `${path}[${key}]`;
  return path ? `${path}.${key}` : key;
}

function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new CircuitFormatError('expected an object', path);
  }
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== 'string' || value.length === 0) {
    throw new CircuitFormatError('expected a non-empty string', path);
  }
  return value;
}

function expectList(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new CircuitFormatError('expected a list', path);
  }
  return value;
}

function optionalList(value: unknown, path: string): unknown[] {
  return value === undefined || value === null ? [] : expectList(value, path);
}

function stringList(value: unknown, path: string): string[] {
  return optionalList(value, path).map((item, i) => expectString(item, at(path, i)));
}

function isPoint(value: unknown): value is Point {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number'
  );
}

function parseParamValue(value: unknown, path: string): ParamValue {
  if (typeof value === 'number') {
    return value;
  }
  if (Array.isArray(value)) {
    const numbers: number[] = [];
    const points: Point[] = [];
    for (const item of value) {
      if (typeof item === 'number') numbers.push(item);
      else if (isPoint(item)) points.push([item[0], item[1]]);
    }
    if (numbers.length === value.length) return numbers;
    if (points.length === value.length) return points;
  }
  throw new CircuitFormatError('expected a number, a list of numbers or a list of [x, y] pairs', path);
}

function parseParams(value: unknown, path: string): ParamRecord | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const record = expectRecord(value, path);
  const params: ParamRecord = {};
  for (const [key, item] of Object.entries(record)) {
    params[key] = parseParamValue(item, at(path, key));
  }
  return params;
}

function parseComponent(value: unknown, path: string): ComponentDecl {
  const record = expectRecord(value, path);
  const decl: ComponentDecl = {
    name: expectString(record.name, at(path, 'name')),
    type: expectString(record.type, at(path, 'type')),
  };
  const params = parseParams(record.params, at(path, 'params'));
  if (params) {
    decl.params = params;
  }
  return decl;
}

// [source, dest] or { source, dest }
function parsePatch(value: unknown, path: string): PatchDecl {
  if (Array.isArray(value)) {
    if (value.length !== 2) {
      throw new CircuitFormatError(`patch must have exactly 2 elements, got ${value.length}`, path);
    }
    return [expectString(value[0], at(path, 0)), expectString(value[1], at(path, 1))];
  }
  if (isRecord(value)) {
    return [
      expectString(value.source, at(path, 'source')),
      expectString(value.dest, at(path, 'dest')),
    ];
  }
  throw new CircuitFormatError('expected [source, dest]', path);
}

function parseRefMap(value: unknown, path: string): Record<string, string> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  const record = expectRecord(value, path);
  const map: Record<string, string> = {};
  for (const [key, ref] of Object.entries(record)) {
    map[key] = expectString(ref, at(path, key));
  }
  return map;
}

function parseScope(value: unknown, path: string): ScopeDecl {
  const record = expectRecord(value, path);
  const channels = optionalList(record.channels, at(path, 'channels')).map((item, i) => {
    const channelPath = at(at(path, 'channels'), i);
    const channel = expectRecord(item, channelPath);
    const decl: ChannelDecl = { source: expectString(channel.source, at(channelPath, 'source')) };
    if (channel.label !== undefined && channel.label !== null) {
      decl.label = expectString(channel.label, at(channelPath, 'label'));
    }
    return decl;
  });
  return { channels };
}

export function parseSubcircuitDef(data: unknown, path: string = ''): SubcircuitDef {
  const record = expectRecord(data, path);
  const def: SubcircuitDef = {
    name: expectString(record.name, at(path, 'name')),
    description: typeof record.description === 'string' ? record.description : '',
    inputs: stringList(record.inputs, at(path, 'inputs')),
    outputs: stringList(record.outputs, at(path, 'outputs')),
    components: optionalList(record.components, at(path, 'components')).map((item, i) =>
      parseComponent(item, at(at(path, 'components'), i))
    ),
    patches: optionalList(record.patches, at(path, 'patches')).map((item, i) =>
      parsePatch(item, at(at(path, 'patches'), i))
    ),
  };
  const inputMap = parseRefMap(record.input_map, at(path, 'input_map'));
  if (inputMap) def.input_map = inputMap;
  const outputMap = parseRefMap(record.output_map, at(path, 'output_map'));
  if (outputMap) def.output_map = outputMap;
  return def;
}

/**
 * Validate an already-deserialized circuit document.
 * Imports are kept as paths; loadCircuitFile resolves them.
 */
export function parseCircuit(data: unknown, path: string = ''): CircuitDecl {
  const record = expectRecord(data, path);
  const circuit: CircuitDecl = {
    name: expectString(record.name, at(path, 'name')),
    description: typeof record.description === 'string' ? record.description : '',
    components: optionalList(record.components, at(path, 'components')).map((item, i) =>
      parseComponent(item, at(at(path, 'components'), i))
    ),
    patches: optionalList(record.patches, at(path, 'patches')).map((item, i) =>
      parsePatch(item, at(at(path, 'patches'), i))
    ),
  };

  if (record.scope !== undefined && record.scope !== null) {
    circuit.scope = parseScope(record.scope, at(path, 'scope'));
  }

  if (record.subcircuits !== undefined && record.subcircuits !== null) {
    const table = expectRecord(record.subcircuits, at(path, 'subcircuits'));
    const subcircuits: Record<string, SubcircuitDef> = {};
    for (const [key, def] of Object.entries(table)) {
      subcircuits[key] = parseSubcircuitDef(def, at(at(path, 'subcircuits'), key));
    }
    circuit.subcircuits = subcircuits;
  }

  const imports = stringList(record.imports, at(path, 'imports'));
  if (imports.length > 0) {
    circuit.imports = imports;
  }

  return circuit;
}

function readJson(file: string): unknown {
  let text: string;
  try {
    text = readFileSync(file, 'utf-8');
  } catch (e) {
    if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
      throw new CircuitFormatError('file not found', file);
    }
    const message = e instanceof Error ? e.message : String(e);
    throw new CircuitFormatError(`cannot read file (${message})`, file);
  }
  try {
    const data: unknown = JSON.parse(text);
    return data;
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    throw new CircuitFormatError(`invalid JSON (${message})`, file);
  }
}

function normalizeName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

export function loadSubcircuitFile(file: string): SubcircuitDef {
  return parseSubcircuitDef(readJson(file), file);
}

/**
 * Load a circuit file and merge its imports into the subcircuit table.
 *
 * Import paths are relative to the importing file. Each import holds one
 * subcircuit definition and is keyed by its own `name`, whatever the file is
 * called; a file stem that does not match gets a warning.
 */
export function loadCircuitFile(file: string): CircuitDecl {
  const circuit = parseCircuit(readJson(file), file);
  const baseDir = dirname(file);

  for (const importPath of circuit.imports ?? []) {
    const resolved = isAbsolute(importPath) ? importPath : join(baseDir, importPath);
    const def = loadSubcircuitFile(resolved);

    const stem = basename(resolved, extname(resolved));
    if (normalizeName(stem) !== normalizeName(def.name)) {
      console.warn(
        `Warning: import '${importPath}' declares subcircuit '${def.name}'; registering it under its declared name`
      );
    }

    const subcircuits = circuit.subcircuits ?? {};
    if (Object.prototype.hasOwnProperty.call(subcircuits, def.name)) {
      throw new DuplicateRegistrationError(def.name);
    }
    subcircuits[def.name] = def;
    circuit.subcircuits = subcircuits;
  }

  return circuit;
}

export function serializeCircuit(circuit: CircuitDecl): string {
  return JSON.stringify(circuit, null, 2) + '\n';
}

export function writeCircuitFile(file: string, circuit: CircuitDecl): void {
  writeFileSync(file, serializeCircuit(circuit));
}
