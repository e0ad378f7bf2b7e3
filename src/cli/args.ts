import { parseArgs } from 'node:util';
import { MOTOR_SPECS, type MotorParameters, type MotorSpecName } from '../motors/index.js';

export type OutputFormat = 'text' | 'json';

/** Individual parameter flags and the nameplate field each one sets */
const PARAMETER_FLAGS = [
  ['nominal-voltage', 'nominalVoltage'],
  ['rated-power', 'ratedPower'],
  ['resistance', 'resistance'],
  ['inductance', 'inductance'],
  ['no-load-current', 'noLoadCurrent'],
  ['no-load-speed', 'noLoadSpeed'],
  ['rotor-inertia', 'rotorInertia']
] as const satisfies ReadonlyArray<readonly [string, keyof MotorParameters]>;

export interface CliOptions {
  /** Preset selected with --preset */
  preset?: MotorSpecName;
  /** JSON file with nameplate values */
  file?: string;
  /** Values given as individual flags, applied over preset and file */
  overrides: Partial<MotorParameters>;
  current?: number;
  voltage?: number;
  speed?: number;
  torque?: number;
  curve?: number;
  format: OutputFormat;
  precision?: number;
  color: boolean;
  verbose: boolean;
  help: boolean;
}

/**
 * Malformed command line
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: motorcalc [source] [queries] [output]

Parameter source (later sources override earlier ones):
  --preset <name>            ${Object.keys(MOTOR_SPECS).join(', ')}
  --file <path>              JSON file with nameplate fields
  --nominal-voltage <V>      --rated-power <W>       --resistance <Ω>
  --inductance <H>           --no-load-current <A>   --no-load-speed <rad/s>
  --rotor-inertia <kg·m²>    --name <label>

Queries:
  --current <A>              operating point at this current
  --voltage <V>              with --current or --curve, supply voltage (default: nominal)
  --speed <rad/s>            with --current, voltage needed for this speed
  --torque <N·m>             current needed for this torque
  --curve <n>                torque-speed table with n points

Output:
  --format text|json         (default: text)
  --precision <n>            decimal places
  --no-color                 plain text
  --verbose                  debug logging
  --help`;

function parseNumber(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;

  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new UsageError(`--${flag} expects a number, got "${raw}"`);
  }
  return value;
}

function parseInteger(flag: string, raw: string | undefined): number | undefined {
  const value = parseNumber(flag, raw);
  if (value !== undefined && !Number.isInteger(value)) {
    throw new UsageError(`--${flag} expects an integer, got "${raw}"`);
  }
  return value;
}

function isPresetName(name: string): name is MotorSpecName {
  return Object.hasOwn(MOTOR_SPECS, name);
}

function parsePreset(raw: string | undefined): MotorSpecName | undefined {
  if (raw === undefined) return undefined;

  const match = Object.keys(MOTOR_SPECS).find(key => key.toLowerCase() === raw.toLowerCase());
  if (match === undefined || !isPresetName(match)) {
    throw new UsageError(`Unknown preset "${raw}" (available: ${Object.keys(MOTOR_SPECS).join(', ')})`);
  }
  return match;
}

function parseFormat(raw: string | undefined): OutputFormat {
  if (raw === undefined || raw === 'text') return 'text';
  if (raw === 'json') return 'json';
  throw new UsageError(`--format expects "text" or "json", got "${raw}"`);
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        preset: { type: 'string' },
        file: { type: 'string' },
        name: { type: 'string' },
        'nominal-voltage': { type: 'string' },
        'rated-power': { type: 'string' },
        resistance: { type: 'string' },
        inductance: { type: 'string' },
        'no-load-current': { type: 'string' },
        'no-load-speed': { type: 'string' },
        'rotor-inertia': { type: 'string' },
        current: { type: 'string' },
        voltage: { type: 'string' },
        speed: { type: 'string' },
        torque: { type: 'string' },
        curve: { type: 'string' },
        format: { type: 'string' },
        precision: { type: 'string' },
        'no-color': { type: 'boolean' },
        verbose: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' }
      }
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const { values } = readArgs(argv);

  const overrides: Partial<MotorParameters> = {};
  for (const [flag, field] of PARAMETER_FLAGS) {
    const value = parseNumber(flag, values[flag]);
    if (value !== undefined) {
      overrides[field] = value;
    }
  }
  if (values.name !== undefined) {
    overrides.name = values.name;
  }

  const precision = parseInteger('precision', values.precision);
  if (precision !== undefined && (precision < 0 || precision > 12)) {
    throw new UsageError(`--precision must be between 0 and 12, got ${precision}`);
  }

  const curve = parseInteger('curve', values.curve);
  if (curve !== undefined && curve < 2) {
    throw new UsageError(`--curve needs at least 2 points, got ${curve}`);
  }

  return {
    preset: parsePreset(values.preset),
    file: values.file,
    overrides,
    current: parseNumber('current', values.current),
    voltage: parseNumber('voltage', values.voltage),
    speed: parseNumber('speed', values.speed),
    torque: parseNumber('torque', values.torque),
    curve,
    format: parseFormat(values.format),
    precision,
    color: values['no-color'] !== true,
    verbose: values.verbose === true,
    help: values.help === true
  };
}
