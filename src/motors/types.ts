/**
 * Motor Types and Specifications - DC Motor Model
 *
 * Models a brushed (permanent-magnet) DC motor with the standard linearized
 * steady-state equations:
 * - Back-EMF:           e = k_t × ω
 * - Armature circuit:   V = I × R + e
 * - Output torque:      τ = k_t × (I − I_0)
 *
 * Everything is derived from seven nameplate values (V_nom, P, R, L, I_0, w_0, J).
 *
 * All calculations use SI units:
 * - Voltage: Volts (V)
 * - Current: Amperes (A)
 * - Resistance: Ohms (Ω)
 * - Inductance: Henries (H)
 * - Power: Watts (W)
 * - Torque: Newton-meters (N·m)
 * - Angular velocity: rad/s
 * - Inertia: kg·m²
 */

/**
 * DC Motor Nameplate Parameters
 * These are the datasheet values the whole model is built from
 */
export interface MotorParameters {
  /** Optional label (e.g. datasheet part number) */
  name?: string;
  /** Nominal terminal voltage V_nom (V) */
  nominalVoltage: number;
  /** Rated power P (W) */
  ratedPower: number;
  /** Terminal (armature) resistance R (Ω) */
  resistance: number;
  /** Terminal (armature) inductance L (H) */
  inductance: number;
  /** No-load current I_0 (A) */
  noLoadCurrent: number;
  /** No-load angular speed w_0 at V_nom (rad/s) */
  noLoadSpeed: number;
  /** Rotor inertia J (kg·m²) */
  rotorInertia: number;
}

/**
 * Model coefficients computed once from the nameplate
 */
export interface DerivedConstants {
  /** Torque constant k_t (N·m/A) */
  torqueConstant: number;
  /** Back-EMF constant k_e (V·s/rad) - numerically equal to k_t in SI units */
  backEmfConstant: number;
  /** Stall current I_stall = V_nom / R (A) */
  stallCurrent: number;
  /** Stall torque τ_stall = k_t × I_stall (N·m) */
  stallTorque: number;
  /** Electrical time constant τ_e = L / R (s) */
  electricalTimeConstant: number;
  /** Mechanical time constant τ_m = R × J / k_t² (s) */
  mechanicalTimeConstant: number;
}

/**
 * Secondary nameplate characteristics
 *
 * These are all consistent with the same linear model, so e.g. the output power at
 * maxMechanicalPowerCurrent equals maxMechanicalPower.
 */
export interface MotorCharacteristics {
  /** Speed constant k_s = 1 / k_t (rad/(V·s)) */
  speedConstant: number;
  /** Motor constant k_m = k_t / √R (N·m/√W) */
  motorConstant: number;
  /** Short-circuit damping B = k_t² / R (N·m·s/rad) */
  shortCircuitDamping: number;
  /** Max continuous current I_cont = √(P / R) (A) */
  maxContinuousCurrent: number;
  /** Output torque at I_cont (N·m) */
  maxContinuousTorque: number;
  /** Current at which mechanical output peaks (A) */
  maxMechanicalPowerCurrent: number;
  /** Peak mechanical output power at V_nom (W) */
  maxMechanicalPower: number;
  /** Current at which efficiency peaks (A) */
  maxEfficiencyCurrent: number;
  /** Peak efficiency at V_nom (dimensionless, 0-1) */
  maxEfficiency: number;
}

/**
 * Complete steady-state operating point
 */
export interface OperatingPoint {
  /** Armature current (A) */
  current: number;
  /** Terminal voltage (V) */
  voltage: number;
  /** Shaft speed (rad/s) */
  speed: number;
  /** Output torque (N·m) */
  torque: number;
  /** Electrical power input V × I (W) */
  inputPower: number;
  /** Mechanical power output τ × ω (W) */
  outputPower: number;
  /** Efficiency (dimensionless), null when no electrical power is drawn */
  efficiency: number | null;
  /** Whether efficiency lies in [0, 1] */
  efficiencyInRange: boolean;
}

/**
 * Example nameplates for typical small brushed DC motors
 */
export const MOTOR_SPECS = {
  /**
   * 12 V hobby motor
   * Stall current 6 A, k_t ≈ 0.0387 N·m/A
   */
  HOBBY_12V: {
    name: '12 V Hobby Motor',
    nominalVoltage: 12,
    ratedPower: 20,
    resistance: 2,
    inductance: 0.001, // 1 mH
    noLoadCurrent: 0.2,
    noLoadSpeed: 300, // ~2865 RPM
    rotorInertia: 2e-5
  },

  /**
   * 24 V servo motor
   * Low-resistance winding, ~7600 RPM no-load
   */
  SERVO_24V: {
    name: '24 V Servo Motor',
    nominalVoltage: 24,
    ratedPower: 150,
    resistance: 0.35,
    inductance: 0.00018,
    noLoadCurrent: 0.14,
    noLoadSpeed: 795,
    rotorInertia: 1.4e-5
  },

  /**
   * 6 V micro motor
   * Toy/gearmotor class, ~12000 RPM no-load
   */
  MICRO_6V: {
    name: '6 V Micro Motor',
    nominalVoltage: 6,
    ratedPower: 3,
    resistance: 4.5,
    inductance: 0.0012,
    noLoadCurrent: 0.07,
    noLoadSpeed: 1250,
    rotorInertia: 6e-7
  }
} as const satisfies Record<string, MotorParameters>;

export type MotorSpecName = keyof typeof MOTOR_SPECS;

/**
 * Convert RPM to rad/s
 */
export function rpmToRadPerSec(rpm: number): number {
  return (rpm * 2 * Math.PI) / 60;
}

/**
 * Convert rad/s to RPM
 */
export function radPerSecToRpm(radPerSec: number): number {
  return (radPerSec * 60) / (2 * Math.PI);
}

/**
 * Check whether an efficiency ratio is physically sensible
 */
export function isEfficiencyInRange(efficiency: number): boolean {
  return efficiency >= 0 && efficiency <= 1;
}
