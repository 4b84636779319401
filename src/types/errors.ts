// Construction-time errors. Stepping never throws.

export type CircuitErrorCode =
  | 'UNKNOWN_TYPE'
  | 'UNKNOWN_COMPONENT'
  | 'UNKNOWN_PORT'
  | 'MALFORMED_REFERENCE'
  | 'DUPLICATE_REGISTRATION'
  | 'PORT_MAPPING'
  | 'INVALID_PARAMS'
  | 'TEMPLATE_CYCLE'
  | 'MISSING_CONTEXT'
  | 'DUPLICATE_COMPONENT'
  | 'INVALID_CIRCUIT';

export class CircuitError extends Error {
  constructor(message: string, public readonly code: CircuitErrorCode) {
    super(message);
    this.name = 'CircuitError';
  }
}

export class UnknownTypeError extends CircuitError {
  constructor(public readonly typeName: string) {
    super(`Unknown component type '${typeName}'`, 'UNKNOWN_TYPE');
    this.name = 'UnknownTypeError';
  }
}

export class UnknownComponentError extends CircuitError {
  constructor(public readonly componentName: string, scope?: string) {
    super(
      scope
        ? `${scope} references unknown component '${componentName}'`
        : `Component '${componentName}' not found`,
      'UNKNOWN_COMPONENT'
    );
    this.name = 'UnknownComponentError';
  }
}

export class UnknownPortError extends CircuitError {
  constructor(
    public readonly componentName: string,
    public readonly portName: string,
    public readonly direction: 'input' | 'output'
  ) {
    super(
      `Component '${componentName}' has no ${direction} port '${portName}'`,
      'UNKNOWN_PORT'
    );
    this.name = 'UnknownPortError';
  }
}

export class MalformedReferenceError extends CircuitError {
  constructor(public readonly ref: string) {
    super(
      `Invalid port reference '${ref}'. Expected format: 'component_name.port_name'`,
      'MALFORMED_REFERENCE'
    );
    this.name = 'MalformedReferenceError';
  }
}

export class DuplicateRegistrationError extends CircuitError {
  constructor(public readonly typeName: string) {
    super(`Type '${typeName}' is already registered`, 'DUPLICATE_REGISTRATION');
    this.name = 'DuplicateRegistrationError';
  }
}

export class PortMappingError extends CircuitError {
  constructor(
    public readonly instanceName: string,
    public readonly portName: string,
    public readonly direction: 'input' | 'output'
  ) {
    const mapName = direction === 'input' ? 'input_map' : 'output_map';
    super(
      `Could not find ${direction} port '${portName}' in subcircuit instance '${instanceName}'. Use ${mapName} to specify mapping.`,
      'PORT_MAPPING'
    );
    this.name = 'PortMappingError';
  }
}

export class InvalidParamsError extends CircuitError {
  constructor(public readonly typeName: string, detail: string) {
    super(`Invalid parameters for ${typeName}: ${detail}`, 'INVALID_PARAMS');
    this.name = 'InvalidParamsError';
  }
}

export class TemplateCycleError extends CircuitError {
  constructor(public readonly chain: string[]) {
    super(`Subcircuit cycle: ${chain.join(' -> ')}`, 'TEMPLATE_CYCLE');
    this.name = 'TemplateCycleError';
  }
}

export class MissingContextError extends CircuitError {
  constructor(public readonly typeName: string) {
    super(
      `Subcircuit '${typeName}' requires a machine and patch bay to instantiate`,
      'MISSING_CONTEXT'
    );
    this.name = 'MissingContextError';
  }
}

export class DuplicateComponentError extends CircuitError {
  constructor(public readonly componentName: string) {
    super(`Duplicate component name '${componentName}'`, 'DUPLICATE_COMPONENT');
    this.name = 'DuplicateComponentError';
  }
}

export class CircuitFormatError extends CircuitError {
  constructor(message: string, public readonly path: string) {
    super(path ? `${path}: ${message}` : message, 'INVALID_CIRCUIT');
    this.name = 'CircuitFormatError';
  }
}
