/**
 * Motor Model - DC Motor Model
 *
 * Steady-state model of a brushed DC motor built from its nameplate.
 *
 * Physics Model:
 * 1. Torque-current relation:         τ = k_t × (I − I_0)
 * 2. Voltage-current-speed relation:  V = I × R + k_t × ω
 * 3. Everything else (speed, current for a torque, powers, efficiency) is a
 *    rearrangement of these two equations
 *
 * The model is immutable once constructed: every query is a pure function of the
 * parameters and the cached derived constants.
 */

import { computeCharacteristics, computeDerivedConstants } from './characteristics.js';
import { DegenerateModelError } from './errors.js';
import { parseMotorParameters } from './schema.js';
import {
  type DerivedConstants,
  type MotorCharacteristics,
  type MotorParameters,
  type OperatingPoint,
  isEfficiencyInRange
} from './types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('MotorModel');

/**
 * Motor Model Class
 *
 * Holds the nameplate and answers operating-point queries.
 */
export class MotorModel {
  readonly parameters: Readonly<MotorParameters>;
  readonly derived: Readonly<DerivedConstants>;
  private cachedCharacteristics: Readonly<MotorCharacteristics> | null = null;

  /**
   * @param parameters - Nameplate values (SI units)
   * @throws InvalidParameterError if any value is non-physical
   */
  constructor(parameters: MotorParameters) {
    this.parameters = Object.freeze(parseMotorParameters(parameters));
    this.derived = Object.freeze(computeDerivedConstants(this.parameters));

    logger.debug(`derived constants for ${this.name}`, this.derived);
  }

  /**
   * Display name of the motor
   */
  get name(): string {
    return this.parameters.name ?? 'DC motor';
  }

  /**
   * Secondary characteristics (computed on first access)
   */
  get characteristics(): Readonly<MotorCharacteristics> {
    if (this.cachedCharacteristics === null) {
      this.cachedCharacteristics = Object.freeze(computeCharacteristics(this.parameters, this.derived));
    }
    return this.cachedCharacteristics;
  }

  /**
   * Torque constant, checked to be usable as a divisor
   */
  private requireTorqueConstant(operation: string): number {
    const { torqueConstant } = this.derived;
    if (torqueConstant === 0) {
      throw new DegenerateModelError(operation, 'torque constant k_t is zero');
    }
    return torqueConstant;
  }

  /**
   * Output torque at a given current
   *
   * τ = k_t × (I − I_0)
   *
   * @param current - Armature current (A)
   * @returns Torque (N·m); negative below the no-load current
   */
  torque(current: number): number {
    return this.derived.torqueConstant * (current - this.parameters.noLoadCurrent);
  }

  /**
   * Shaft speed at a given current and terminal voltage
   *
   * ω = (V − I × R) / k_t
   *
   * @param current - Armature current (A)
   * @param voltage - Terminal voltage (V), defaults to V_nom
   * @returns Angular speed (rad/s)
   */
  speed(current: number, voltage: number = this.parameters.nominalVoltage): number {
    const torqueConstant = this.requireTorqueConstant('speed');
    return (voltage - current * this.parameters.resistance) / torqueConstant;
  }

  /**
   * Current needed to deliver a given output torque
   *
   * I = τ / k_t + I_0
   *
   * @param torque - Output torque (N·m)
   * @returns Armature current (A)
   */
  currentForTorque(torque: number): number {
    const torqueConstant = this.requireTorqueConstant('currentForTorque');
    return torque / torqueConstant + this.parameters.noLoadCurrent;
  }

  /**
   * Terminal voltage that sustains a current at a speed
   *
   * V = I × R + k_t × ω
   */
  voltageForOperatingPoint(current: number, speed: number): number {
    return current * this.parameters.resistance + this.derived.torqueConstant * speed;
  }

  /**
   * Mechanical output power P_out = τ × ω (W)
   */
  powerOutput(torque: number, speed: number): number {
    return torque * speed;
  }

  /**
   * Electrical input power P_in = V × I (W)
   */
  powerInput(voltage: number, current: number): number {
    return voltage * current;
  }

  /**
   * Efficiency at an operating point
   *
   * η = τ(I) × ω / (V × I)
   *
   * The ratio is never clamped. Values outside [0, 1] mean the operating point is
   * inconsistent with the model (e.g. a speed the voltage cannot sustain) and are
   * logged as warnings.
   *
   * @param voltage - Terminal voltage (V)
   * @param current - Armature current (A)
   * @param speed - Shaft speed (rad/s)
   * @throws DegenerateModelError if V × I is zero
   */
  efficiency(voltage: number, current: number, speed: number): number {
    const inputPower = this.powerInput(voltage, current);
    if (inputPower === 0) {
      throw new DegenerateModelError('efficiency', `input power V × I is zero (V=${voltage} V, I=${current} A)`);
    }

    const efficiency = this.powerOutput(this.torque(current), speed) / inputPower;
    if (!isEfficiencyInRange(efficiency)) {
      logger.warn(
        `efficiency ${efficiency} outside [0, 1] at V=${voltage} V, I=${current} A, ω=${speed} rad/s`
      );
    }
    return efficiency;
  }

  /**
   * Evaluate the full steady state at a current and supply voltage
   *
   * @param current - Armature current (A)
   * @param voltage - Terminal voltage (V), defaults to V_nom
   */
  operatingPoint(current: number, voltage: number = this.parameters.nominalVoltage): OperatingPoint {
    const speed = this.speed(current, voltage);
    const torque = this.torque(current);
    const inputPower = this.powerInput(voltage, current);
    const efficiency = inputPower === 0 ? null : this.efficiency(voltage, current, speed);

    return {
      current,
      voltage,
      speed,
      torque,
      inputPower,
      outputPower: this.powerOutput(torque, speed),
      efficiency,
      efficiencyInRange: efficiency !== null && isEfficiencyInRange(efficiency)
    };
  }

  /**
   * Sample the torque-speed line from no load to stall
   *
   * Currents are evenly spaced from I_0 to V / R.
   *
   * @param samples - Number of points (integer ≥ 2)
   * @param voltage - Terminal voltage (V), defaults to V_nom
   */
  torqueSpeedCurve(samples: number = 11, voltage: number = this.parameters.nominalVoltage): OperatingPoint[] {
    if (!Number.isInteger(samples) || samples < 2) {
      throw new RangeError(`torqueSpeedCurve needs an integer sample count ≥ 2, got ${samples}`);
    }

    const { noLoadCurrent, resistance } = this.parameters;
    const stallCurrent = voltage / resistance;
    const step = (stallCurrent - noLoadCurrent) / (samples - 1);

    const points: OperatingPoint[] = [];
    for (let i = 0; i < samples; i++) {
      // Pin the last sample to stall exactly
      const current = i === samples - 1 ? stallCurrent : noLoadCurrent + step * i;
      points.push(this.operatingPoint(current, voltage));
    }
    return points;
  }
}
