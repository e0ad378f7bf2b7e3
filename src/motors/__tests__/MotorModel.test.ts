import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import { MotorModel } from '../MotorModel.js';
import { computeDerivedConstants } from '../characteristics.js';
import { DegenerateModelError, InvalidParameterError } from '../errors.js';
import { MOTOR_SPECS, type MotorParameters } from '../types.js';
import { setLogLevel } from '../../utils/logger.js';

const HOBBY: MotorParameters = {
  nominalVoltage: 12,
  ratedPower: 20,
  resistance: 2,
  inductance: 0.001,
  noLoadCurrent: 0.2,
  noLoadSpeed: 300,
  rotorInertia: 2e-5
};

// k_t = (12 − 0.2 × 2) / 300
const K_T = 11.6 / 300;

describe('MotorModel', () => {
  let warn: MockInstance<typeof console.warn>;

  beforeEach(() => {
    setLogLevel('warn');
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('derived constants', () => {
    it('matches the 12 V / 2 Ω / 300 rad/s reference motor', () => {
      const { derived } = new MotorModel(HOBBY);

      expect(derived.stallCurrent).toBe(6);
      expect(derived.torqueConstant).toBeCloseTo(0.03867, 5);
      expect(derived.backEmfConstant).toBe(derived.torqueConstant);
      expect(derived.stallTorque).toBeCloseTo(0.232, 12);
      expect(derived.electricalTimeConstant).toBeCloseTo(0.0005, 15);
      expect(derived.mechanicalTimeConstant).toBeCloseTo((2 * 2e-5) / (K_T * K_T), 12);
    });

    it('is a pure function of the parameters', () => {
      expect(computeDerivedConstants(HOBBY)).toEqual(computeDerivedConstants({ ...HOBBY }));
      expect(new MotorModel(HOBBY).derived).toEqual(new MotorModel(HOBBY).derived);
    });

    it('holds for every preset', () => {
      for (const spec of Object.values(MOTOR_SPECS)) {
        const motor = new MotorModel(spec);
        const { stallCurrent, stallTorque } = motor.derived;

        expect(stallCurrent).toBeGreaterThan(spec.noLoadCurrent);
        expect(stallTorque).toBeGreaterThan(0);
        expect(motor.torque(spec.noLoadCurrent)).toBe(0);
        expect(motor.speed(stallCurrent)).toBeCloseTo(0, 9);
        expect(motor.speed(spec.noLoadCurrent)).toBeCloseTo(spec.noLoadSpeed, 9);
      }
    });
  });

  describe('construction', () => {
    it('rejects zero resistance', () => {
      expect(() => new MotorModel({ ...HOBBY, resistance: 0 })).toThrow(InvalidParameterError);
    });

    it('rejects a no-load current at or above stall current', () => {
      expect(() => new MotorModel({ ...HOBBY, noLoadCurrent: 7 })).toThrow(InvalidParameterError);
      expect(() => new MotorModel({ ...HOBBY, noLoadCurrent: 6 })).toThrow(InvalidParameterError);
    });

    it('accepts zero inductance and zero no-load current', () => {
      const motor = new MotorModel({ ...HOBBY, inductance: 0, noLoadCurrent: 0 });

      expect(motor.derived.electricalTimeConstant).toBe(0);
      expect(motor.derived.torqueConstant).toBeCloseTo(0.04, 15);
    });

    it('freezes parameters and derived constants', () => {
      const input = { ...HOBBY };
      const motor = new MotorModel(input);
      input.resistance = 4;

      expect(motor.parameters.resistance).toBe(2);
      expect(Object.isFrozen(motor.parameters)).toBe(true);
      expect(Object.isFrozen(motor.derived)).toBe(true);
    });

    it('falls back to a generic name', () => {
      expect(new MotorModel(HOBBY).name).toBe('DC motor');
      expect(new MotorModel(MOTOR_SPECS.HOBBY_12V).name).toBe('12 V Hobby Motor');
    });
  });

  describe('operating-point queries', () => {
    const motor = new MotorModel(HOBBY);

    it('produces no torque at the no-load current', () => {
      expect(motor.torque(0.2)).toBe(0);
      expect(motor.torque(3)).toBeCloseTo(K_T * 2.8, 15);
    });

    it('reaches zero speed at stall and w_0 at no load', () => {
      expect(motor.speed(6, 12)).toBe(0);
      expect(motor.speed(0.2, 12)).toBeCloseTo(300, 9);
      expect(motor.speed(0.2)).toBeCloseTo(300, 9);
    });

    it('inverts torque with currentForTorque', () => {
      for (const current of [-1, 0, 0.2, 1.5, 3, 6, 9.75]) {
        expect(motor.currentForTorque(motor.torque(current))).toBeCloseTo(current, 12);
      }
    });

    it('computes the voltage for a current and speed', () => {
      expect(motor.voltageForOperatingPoint(1, 100)).toBeCloseTo(2 + K_T * 100, 12);
      expect(motor.voltageForOperatingPoint(0.2, 300)).toBeCloseTo(12, 12);
    });

    it('computes input and output power', () => {
      expect(motor.powerOutput(0.5, 100)).toBe(50);
      expect(motor.powerInput(12, 3)).toBe(36);
    });

    it('computes efficiency without clamping', () => {
      const speed = motor.speed(3, 12);

      expect(motor.efficiency(12, 3, speed)).toBeCloseTo(16.8 / 36, 12);
      expect(warn).not.toHaveBeenCalled();
    });

    it('stays within [0, 1] between no load and stall', () => {
      for (let current = 0.2; current <= 6; current += 0.29) {
        const eta = motor.efficiency(12, current, motor.speed(current, 12));
        expect(eta).toBeGreaterThanOrEqual(0);
        expect(eta).toBeLessThanOrEqual(1);
      }
    });

    it('reports and flags an efficiency above 1', () => {
      const eta = motor.efficiency(12, 1, 1000);

      expect(eta).toBeCloseTo((K_T * 0.8 * 1000) / 12, 12);
      expect(warn).toHaveBeenCalledTimes(1);
      expect(warn.mock.calls[0]?.[0]).toMatch(/^\[MotorModel\] efficiency .* outside \[0, 1\]/);
    });

    it('fails on zero input power', () => {
      expect(() => motor.efficiency(0, 3, 100)).toThrow(DegenerateModelError);
      expect(() => motor.efficiency(12, 0, 100)).toThrow(DegenerateModelError);
    });

    it('names the failing operation', () => {
      try {
        motor.efficiency(0, 3, 100);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(DegenerateModelError);
        expect(error instanceof DegenerateModelError && error.operation).toBe('efficiency');
      }
    });
  });

  describe('operatingPoint', () => {
    const motor = new MotorModel(HOBBY);

    it('evaluates every quantity at a current', () => {
      const point = motor.operatingPoint(3);

      expect(point.current).toBe(3);
      expect(point.voltage).toBe(12);
      expect(point.speed).toBeCloseTo(6 / K_T, 9);
      expect(point.torque).toBeCloseTo(K_T * 2.8, 12);
      expect(point.inputPower).toBe(36);
      expect(point.outputPower).toBeCloseTo(16.8, 9);
      expect(point.efficiency).toBeCloseTo(16.8 / 36, 9);
      expect(point.efficiencyInRange).toBe(true);
    });

    it('flags negative efficiency below the no-load current', () => {
      const point = motor.operatingPoint(0.1);

      expect(point.torque).toBeLessThan(0);
      expect(point.efficiency).toBeLessThan(0);
      expect(point.efficiencyInRange).toBe(false);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('has no efficiency when no current flows', () => {
      const point = motor.operatingPoint(0);

      expect(point.inputPower).toBe(0);
      expect(point.efficiency).toBeNull();
      expect(point.efficiencyInRange).toBe(false);
    });
  });

  describe('torqueSpeedCurve', () => {
    const motor = new MotorModel(HOBBY);

    it('samples from no load to stall', () => {
      const curve = motor.torqueSpeedCurve(3);

      expect(curve.map(p => p.current)).toEqual([0.2, expect.closeTo(3.1, 12), 6]);
      expect(curve[0]?.torque).toBe(0);
      expect(curve[0]?.speed).toBeCloseTo(300, 9);
      expect(curve[1]?.outputPower).toBeCloseTo(motor.characteristics.maxMechanicalPower, 9);
      expect(curve[2]?.speed).toBe(0);
      expect(curve[2]?.efficiency).toBe(0);
    });

    it('uses the stall current of the given voltage', () => {
      const curve = motor.torqueSpeedCurve(2, 6);

      expect(curve[1]?.current).toBe(3);
      expect(curve[1]?.speed).toBe(0);
    });

    it('defaults to eleven points', () => {
      expect(motor.torqueSpeedCurve()).toHaveLength(11);
    });

    it('rejects fewer than two or fractional samples', () => {
      expect(() => motor.torqueSpeedCurve(1)).toThrow(RangeError);
      expect(() => motor.torqueSpeedCurve(2.5)).toThrow(RangeError);
    });
  });
});
