import type { OptionType } from "../risk/pricing.js";

export interface OccContract {
  underlying: string;
  expiration: Date;
  optionType: OptionType;
  strike: number;
}

// ROOT + YYMMDD + C|P + strike * 1000 padded to 8 digits, e.g. AAPL240119C00150000
const OCC_PATTERN = /^([A-Z0-9.]{1,6})\s*(\d{2})(\d{2})(\d{2})([CP])(\d{8})$/;

export function parseOccSymbol(symbol: string): OccContract | null {
  const match = OCC_PATTERN.exec(symbol.trim().toUpperCase());
  if (!match) return null;

  const [, root, yy, mm, dd, side, strike] = match;
  return {
    underlying: root,
    expiration: new Date(Date.UTC(2000 + Number(yy), Number(mm) - 1, Number(dd))),
    optionType: side === "C" ? "call" : "put",
    strike: Number(strike) / 1000,
  };
}
