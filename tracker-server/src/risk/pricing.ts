/**
 * Option pricing models used to derive Greeks and finish-side probabilities.
 *
 * The engine only talks to the PricingModel interface; Black-Scholes is the
 * default implementation.
 */

import type { Greeks } from "./types.js";

export type OptionType = "call" | "put";

export interface OptionInput {
  optionType: OptionType;
  spot: number;
  strike: number;
  /** Years until expiration. Zero or less means expired. */
  timeToExpiration: number;
  /** Annualized volatility, e.g. 0.3. */
  volatility: number;
  riskFreeRate: number;
}

export interface PricingModel {
  readonly name: string;
  /** Per-share Greeks from the option holder's side. */
  greeks(input: OptionInput): Greeks;
  /** Probability the underlying finishes strictly above `level`. */
  probabilityAbove(input: OptionInput, level: number): number;
  /** Probability the underlying finishes strictly below `level`. */
  probabilityBelow(input: OptionInput, level: number): number;
}

const DAYS_PER_YEAR = 365;

/**
 * Standard normal CDF, Abramowitz and Stegun 26.2.17.
 * Maximum absolute error 7.5e-8.
 */
export function normalCDF(x: number): number {
  const p = 0.2316419;
  const b1 = 0.31938153;
  const b2 = -0.356563782;
  const b3 = 1.781477937;
  const b4 = -1.821255978;
  const b5 = 1.330274429;

  const absX = Math.abs(x);
  const t = 1 / (1 + p * absX);
  const poly = t * (b1 + t * (b2 + t * (b3 + t * (b4 + t * b5))));
  const upper = 1 - normalPDF(absX) * poly;
  return x >= 0 ? upper : 1 - upper;
}

export function normalPDF(x: number): number {
  return Math.exp(-0.5 * x * x) / Math.sqrt(2 * Math.PI);
}

function isDegenerate(input: OptionInput): boolean {
  return input.timeToExpiration <= 0 || input.volatility <= 0 || input.spot <= 0;
}

/** Forward price; equals spot once expired. */
function forward(input: OptionInput): number {
  return input.spot * Math.exp(input.riskFreeRate * Math.max(input.timeToExpiration, 0));
}

export class BlackScholesModel implements PricingModel {
  readonly name = "black-scholes";

  greeks(input: OptionInput): Greeks {
    const isCall = input.optionType === "call";

    if (isDegenerate(input)) {
      const F = forward(input);
      const K = input.strike;
      return {
        delta: isCall ? (F > K ? 1 : 0) : F < K ? -1 : 0,
        gamma: 0,
        theta: 0,
        vega: 0,
      };
    }

    const { spot: S, strike: K, timeToExpiration: T, volatility: sigma, riskFreeRate: r } = input;
    const sqrtT = Math.sqrt(T);
    const d1 = (Math.log(S / K) + (r + (sigma * sigma) / 2) * T) / (sigma * sqrtT);
    const d2 = d1 - sigma * sqrtT;
    const nd1 = normalPDF(d1);
    const discountedStrike = K * Math.exp(-r * T);

    const decay = -(S * nd1 * sigma) / (2 * sqrtT);
    const annualTheta = isCall
      ? decay - r * discountedStrike * normalCDF(d2)
      : decay + r * discountedStrike * normalCDF(-d2);

    return {
      delta: isCall ? normalCDF(d1) : normalCDF(d1) - 1,
      gamma: nd1 / (S * sigma * sqrtT),
      theta: annualTheta / DAYS_PER_YEAR,
      vega: (S * sqrtT * nd1) / 100,
    };
  }

  probabilityAbove(input: OptionInput, level: number): number {
    if (level <= 0) return 1;
    if (isDegenerate(input)) return forward(input) > level ? 1 : 0;
    return normalCDF(this.d2(input, level));
  }

  probabilityBelow(input: OptionInput, level: number): number {
    if (level <= 0) return 0;
    if (isDegenerate(input)) return forward(input) < level ? 1 : 0;
    return normalCDF(-this.d2(input, level));
  }

  /** Risk-neutral d2 for finishing above `level`. */
  private d2(input: OptionInput, level: number): number {
    const { spot: S, timeToExpiration: T, volatility: sigma, riskFreeRate: r } = input;
    return (Math.log(S / level) + (r - (sigma * sigma) / 2) * T) / (sigma * Math.sqrt(T));
  }
}
