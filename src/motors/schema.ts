/**
 * Nameplate validation
 *
 * Constraints (SI units):
 * - V_nom, P, R, w_0, J strictly positive
 * - L, I_0 non-negative
 * - I_0 below the stall current V_nom / R, otherwise k_t would be zero or negative
 */

import { z } from 'zod';
import { InvalidParameterError } from './errors.js';
import type { MotorParameters } from './types.js';

export const MotorParametersSchema = z
  .object({
    name: z.string().optional(),
    nominalVoltage: z.number().positive('nominal voltage must be > 0 V'),
    ratedPower: z.number().positive('rated power must be > 0 W'),
    resistance: z.number().positive('terminal resistance must be > 0 Ω'),
    inductance: z.number().nonnegative('terminal inductance must be ≥ 0 H'),
    noLoadCurrent: z.number().nonnegative('no-load current must be ≥ 0 A'),
    noLoadSpeed: z.number().positive('no-load speed must be > 0 rad/s'),
    rotorInertia: z.number().positive('rotor inertia must be > 0 kg·m²')
  })
  .superRefine((params, ctx) => {
    // Only meaningful once voltage and resistance are themselves valid
    if (!(params.nominalVoltage > 0 && params.resistance > 0)) return;

    // Checked on the k_t numerator V_nom − I_0 × R itself, not on I_0 < V_nom / R
    const stallCurrent = params.nominalVoltage / params.resistance;
    if (params.nominalVoltage - params.noLoadCurrent * params.resistance <= 0) {
      ctx.addIssue({
        code: 'custom',
        path: ['noLoadCurrent'],
        message: `no-load current ${params.noLoadCurrent} A must be below stall current ${stallCurrent} A (V_nom / R)`
      });
    }
  });

/**
 * Validate raw input (object literal, parsed JSON, CLI flags) as motor parameters
 *
 * @throws InvalidParameterError listing every violated constraint
 */
export function parseMotorParameters(input: unknown): MotorParameters {
  const result = MotorParametersSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map(issue => {
    const field = issue.path.map(String).join('.');
    return field ? `${field}: ${issue.message}` : issue.message;
  });
  const first = result.error.issues[0];
  const parameter = first !== undefined && first.path.length > 0 ? String(first.path[0]) : undefined;

  throw new InvalidParameterError(parameter, issues);
}
