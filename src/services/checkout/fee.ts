import { UnsupportedCurrencyError } from "./errors.js";

const BPS_DENOMINATOR = 10_000;

export interface FeeSchedule {
  supportedCurrencies: string[];
  baseFeeMinor: number;
  rateBps: number;
  roundingStepMinor: number;
}

export interface GatewayFeeBreakdown {
  currency: string;
  amount: number;
  baseFeeMinor: number;
  percentageFeeMinor: number;
  totalFeeMinor: number;
}

export const DEFAULT_FEE_SCHEDULE: FeeSchedule = {
  supportedCurrencies: ["IDR"],
  baseFeeMinor: 2000,
  rateBps: 290,
  roundingStepMinor: 1000,
};

export function assertSupportedCurrency(
  currency: string,
  schedule: Pick<FeeSchedule, "supportedCurrencies">
): string {
  const normalized = currency.trim().toUpperCase();
  if (!schedule.supportedCurrencies.includes(normalized)) {
    throw new UnsupportedCurrencyError(currency, schedule.supportedCurrencies);
  }
  return normalized;
}

/**
 * Gateway fee charged to the payer: a flat base fee plus a percentage of the
 * amount, with the percentage part rounded down to a multiple of
 * `roundingStepMinor`.
 */
export function calculateGatewayFee(input: {
  amount: number;
  currency: string;
  schedule?: FeeSchedule;
}): GatewayFeeBreakdown {
  const { amount, schedule = DEFAULT_FEE_SCHEDULE } = input;
  const currency = assertSupportedCurrency(input.currency, schedule);

  if (!Number.isFinite(amount) || amount < 0) {
    throw new Error("amount must be a non-negative finite number");
  }
  if (
    !Number.isInteger(schedule.rateBps) ||
    schedule.rateBps < 0 ||
    schedule.rateBps > BPS_DENOMINATOR
  ) {
    throw new Error("rateBps must be an integer between 0 and 10000");
  }
  if (!Number.isInteger(schedule.roundingStepMinor) || schedule.roundingStepMinor <= 0) {
    throw new Error("roundingStepMinor must be a positive integer");
  }

  const percentageFeeMinor =
    Math.floor(
      (amount * schedule.rateBps) / BPS_DENOMINATOR / schedule.roundingStepMinor
    ) * schedule.roundingStepMinor;

  return {
    currency,
    amount,
    baseFeeMinor: schedule.baseFeeMinor,
    percentageFeeMinor,
    totalFeeMinor: schedule.baseFeeMinor + percentageFeeMinor,
  };
}
