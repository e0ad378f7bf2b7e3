/**
 * Main Entry Point - DC Motor Model
 *
 * Library surface: the motor model, its value types and errors, plus the
 * configuration and logging hooks.
 *
 * @example
 * const motor = new MotorModel(MOTOR_SPECS.HOBBY_12V);
 * motor.derived.stallTorque;          // 0.232 N·m
 * motor.speed(motor.derived.stallCurrent); // 0 rad/s
 */

export * from './motors/index.js';
export { loadConfig, DEFAULT_CONFIG, type MotorModelConfig } from './config.js';
export { createLogger, setLogLevel, getLogLevel, LOG_LEVELS, type Logger, type LogLevel } from './utils/logger.js';
export { roundTo, formatQuantity } from './utils/formatNumber.js';
