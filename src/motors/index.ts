/**
 * Motors Module - DC Motor Model
 *
 * Exports all motor-related types, validation and the model class.
 */

export * from './types.js';
export * from './errors.js';
export * from './schema.js';
export * from './characteristics.js';
export * from './MotorModel.js';
