import type { Disambiguator } from '@autofields/shared';

export type VehicleToken = 'year' | 'brand';

/**
 * Brand and year are printed by the same element on the listing page:
 * a 4-digit number is the model year, anything else is the brand
 */
export function classifyVehicleToken(text: string): VehicleToken {
  return /^\d{4}$/.test(text.trim()) ? 'year' : 'brand';
}

export function classifiedAs(kind: VehicleToken): Disambiguator {
  return text => classifyVehicleToken(text) === kind;
}
