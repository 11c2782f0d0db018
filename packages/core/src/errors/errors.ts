const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const describeValue = (value: unknown): string => {
  if (value === null) return 'null';
  if (Array.isArray(value)) return `array(${value.length})`;
  return typeof value;
};

/**
 * Malformed flag space declaration, registration, or registry configuration.
 *
 * Raised at setup time; nothing retries it.
 */
export class ConfigurationError extends Error {
  constructor(
    public reason: string,
    devLines?: string[]
  ) {
    const dev = devLines ?? ['Invalid configuration', '', `Invalid configuration: ${reason}`];
    super(format(`Invalid configuration: ${reason}`, dev));
    this.name = 'ConfigurationError';
  }
}

/**
 * A trigger flag registered twice under the 'error' duplicate policy.
 */
export class DuplicateTriggerError extends ConfigurationError {
  constructor(
    public flag: string,
    public existing: string,
    public incoming: string,
    public registryName: string
  ) {
    const reason = `flag '${flag}' is already handled by '${existing}'`;
    super(reason, [
      'Duplicate trigger flag',
      '',
      `Flag '${flag}' is already bound to '${existing}' in '${registryName}', cannot bind '${incoming}'.`,
      '',
      'To fix this:',
      `  1. Remove one of the two registrations`,
      `  2. Or construct the registry with duplicatePolicy: 'replace' (or 'warn') to let the latest win`,
    ]);
    this.name = 'DuplicateTriggerError';
  }
}

/**
 * Reference to a flag name or value the flag space (or the registry) does not know.
 */
export class UnknownFlagError extends Error {
  constructor(
    public flag: string | number,
    public knownFlags: string[],
    public referencedBy?: string
  ) {
    const shown = typeof flag === 'number' ? `0b${flag.toString(2)}` : flag;
    const parts: string[] = [`Unknown flag '${shown}'.`, ''];

    if (referencedBy) {
      parts.push(`Referenced by: ${referencedBy}`, '');
    }

    if (knownFlags.length > 0 && knownFlags.length <= 10) {
      parts.push('Known flags:');
      knownFlags.forEach((f) => parts.push(`  - ${f}`));
      parts.push('');
    } else if (knownFlags.length > 10) {
      parts.push(`${knownFlags.length} flags are known.`, '');
    }

    parts.push('To fix this:');
    parts.push(`  1. Check for typos in the flag name`);
    parts.push(`  2. Declare the flag when defining the flag space`);
    parts.push(`  3. Register a handler for every flag used in 'dependsOn'`);

    const short = referencedBy
      ? `Unknown flag '${shown}' referenced by '${referencedBy}'.`
      : `Unknown flag '${shown}'.`;
    super(format(short, parts));
    this.name = 'UnknownFlagError';
  }
}

/**
 * Dependency cycle among the bindings selected by a build.
 */
export class CircularDependencyError extends Error {
  constructor(public cycle: string[]) {
    const cycleStr = cycle.join(' → ');
    const message = format(`Circular dependency detected: ${cycleStr}`, [
      'Circular dependency detected:',
      '',
      `  ${cycleStr}`,
      '',
      `This means ${cycle[cycle.length - 1]} depends on itself through other handlers.`,
      'No handler was executed.',
      '',
      'Solutions:',
      `  1. Remove one of the 'dependsOn' links along the cycle`,
      `  2. Move the shared work into a handler both sides depend on`,
    ]);
    super(message);
    this.name = 'CircularDependencyError';
  }
}

/**
 * A handler returned a value its binding cannot merge.
 */
export class InvalidHandlerResultError extends Error {
  constructor(
    public label: string,
    public expected: string,
    public received: unknown
  ) {
    const dev = [
      'Invalid handler result',
      '',
      `Handler '${label}' must return ${expected}.`,
      '',
      'Received:',
      `  ${describeValue(received)}`,
      '',
      'Handlers registered without an output key are merged key by key into the result.',
      'Handlers registered with several flags must return one value per flag.',
    ];
    super(format(`Handler '${label}' must return ${expected}.`, dev));
    this.name = 'InvalidHandlerResultError';
  }
}
