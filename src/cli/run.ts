import { Chalk } from 'chalk';
import { loadConfig } from '../config.js';
import {
  MOTOR_SPECS,
  MotorModel,
  MotorModelError,
  parseMotorParameters,
  type MotorParameters
} from '../motors/index.js';
import { createLogger, setLogLevel } from '../utils/logger.js';
import { parseCliArgs, UsageError, USAGE, type CliOptions } from './args.js';
import { buildReport, formatJsonReport, formatTextReport } from './report.js';

const logger = createLogger('motorcalc');

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readFile(path: string): string;
  env: NodeJS.ProcessEnv;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read nameplate values from a JSON file
 */
function readParameterFile(path: string, io: CliIO): Record<string, unknown> {
  let text: string;
  try {
    text = io.readFile(path);
  } catch (error) {
    throw new UsageError(`Cannot read ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new UsageError(`${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  if (!isRecord(parsed)) {
    throw new UsageError(`${path} must contain a JSON object of motor parameters`);
  }
  return parsed;
}

/**
 * Merge preset, file and flag values, in that order
 */
function resolveParameters(options: CliOptions, io: CliIO): MotorParameters {
  const fromPreset = options.preset ? MOTOR_SPECS[options.preset] : {};
  const fromFile = options.file ? readParameterFile(options.file, io) : {};

  if (!options.preset && !options.file && Object.keys(options.overrides).length === 0) {
    throw new UsageError('No motor parameters given: use --preset, --file or the parameter flags');
  }

  logger.debug('parameter sources', {
    preset: options.preset ?? null,
    file: options.file ?? null,
    overrides: options.overrides
  });

  return parseMotorParameters({ ...fromPreset, ...fromFile, ...options.overrides });
}

/**
 * Run the command line and return the process exit code
 */
export function runCli(argv: readonly string[], io: CliIO): number {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const chalk = new Chalk({ level: options.color ? 1 : 0 });

  if (options.help) {
    io.stdout(USAGE);
    return EXIT_OK;
  }

  try {
    const config = loadConfig(io.env);
    setLogLevel(options.verbose ? 'debug' : config.logLevel);

    if (options.speed !== undefined && options.current === undefined) {
      throw new UsageError('--speed needs --current');
    }
    if (options.voltage !== undefined && options.current === undefined && options.curve === undefined) {
      throw new UsageError('--voltage needs --current or --curve');
    }

    const model = new MotorModel(resolveParameters(options, io));
    const report = buildReport(model, options);
    const precision = options.precision ?? config.precision;

    io.stdout(
      options.format === 'json'
        ? formatJsonReport(report, precision)
        : formatTextReport(report, { precision, color: options.color })
    );
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(chalk.red(error.message));
      return EXIT_USAGE;
    }
    if (error instanceof MotorModelError) {
      io.stderr(chalk.red(`${error.name}: ${error.message}`));
      return EXIT_FAILURE;
    }
    throw error;
  }
}
