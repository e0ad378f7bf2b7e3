/**
 * Nameplate-derived coefficients
 *
 * Pure functions of the parameters: same inputs, same outputs, no hidden state.
 *
 * References:
 * - Linearized brushed DC motor model (back-EMF e = k_t × ω, V = I × R + e)
 * - Motor datasheet conventions for stall, continuous and peak ratings
 */

import type { DerivedConstants, MotorCharacteristics, MotorParameters } from './types.js';

/**
 * Compute the core model coefficients
 *
 * Equations:
 * - I_stall = V_nom / R            (ω = 0, all voltage across R)
 * - k_t = (V_nom − I_0 × R) / w_0  (no load: I = I_0, ω = w_0)
 * - τ_stall = k_t × I_stall
 * - τ_e = L / R
 * - τ_m = R × J / k_t²
 */
export function computeDerivedConstants(params: MotorParameters): DerivedConstants {
  const { nominalVoltage, resistance, inductance, noLoadCurrent, noLoadSpeed, rotorInertia } = params;

  const stallCurrent = nominalVoltage / resistance;
  const torqueConstant = (nominalVoltage - noLoadCurrent * resistance) / noLoadSpeed;

  return {
    torqueConstant,
    backEmfConstant: torqueConstant,
    stallCurrent,
    stallTorque: torqueConstant * stallCurrent,
    electricalTimeConstant: inductance / resistance,
    mechanicalTimeConstant: (resistance * rotorInertia) / (torqueConstant * torqueConstant)
  };
}

/**
 * Compute the secondary characteristics
 *
 * Output power P(I) = (I − I_0) × (V − I × R) is a parabola in I, peaking midway
 * between I_0 and I_stall:
 * - I_Pmax = (I_stall + I_0) / 2
 * - P_max = R × (I_stall − I_0)² / 4
 *
 * Efficiency η(I) = (I − I_0)(V − I × R) / (V × I) peaks at the geometric mean:
 * - I_ηmax = √(I_0 × I_stall)
 * - η_max = (1 − √(I_0 / I_stall))²
 */
export function computeCharacteristics(
  params: MotorParameters,
  derived: DerivedConstants
): MotorCharacteristics {
  const { ratedPower, resistance, noLoadCurrent } = params;
  const { torqueConstant, stallCurrent } = derived;

  // Continuous rating: resistive loss I²R equal to the rated power
  const maxContinuousCurrent = Math.sqrt(ratedPower / resistance);
  const usableCurrent = stallCurrent - noLoadCurrent;

  return {
    speedConstant: 1 / torqueConstant,
    motorConstant: torqueConstant / Math.sqrt(resistance),
    shortCircuitDamping: (torqueConstant * torqueConstant) / resistance,
    maxContinuousCurrent,
    maxContinuousTorque: torqueConstant * (maxContinuousCurrent - noLoadCurrent),
    maxMechanicalPowerCurrent: (stallCurrent + noLoadCurrent) / 2,
    maxMechanicalPower: (resistance * usableCurrent * usableCurrent) / 4,
    maxEfficiencyCurrent: Math.sqrt(noLoadCurrent * stallCurrent),
    maxEfficiency: Math.pow(1 - Math.sqrt(noLoadCurrent / stallCurrent), 2)
  };
}
