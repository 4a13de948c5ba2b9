import { DEFAULT_FINANCE_CONFIG } from "./config";
import type {
  FinanceConfig,
  MonthlyCostInput,
  MonthlyCosts,
  OnceOffCosts,
  TransferDutyBracket,
} from "./types";

export const DEPOSIT_RATE = 0.1;

// Once-off fees, as a fraction of the purchase price unless noted
const BOND_REGISTRATION_RATE = 0.01; // of bond amount
const TRANSFER_COSTS_RATE = 0.01;
const ATTORNEY_FEES_RATE = 0.005;
const BOND_ORIGINATION_RATE = 0.005; // of bond amount
const MOVING_COSTS_RATE = 0.002;
const SECURITY_SETUP_RATE = 0.005;
const IMMEDIATE_REPAIRS_RATE = 0.01;

// Monthly estimates; insurance and maintenance rates are annual
const INSURANCE_RATE = 0.003; // of bond amount
const MAINTENANCE_RATE = 0.01;
const UTILITIES_RATE = 0.001;
const UTILITIES_MIN = 1500;
const UTILITIES_MAX = 3500;
const SECURITY_RATE = 0.0002;
const SECURITY_MIN = 300;
const SECURITY_MAX = 800;

/**
 * Coerce a scraped amount such as "R 27 000", "1,210,000" or 27000 into a
 * number. Anything that cannot be read as a plain decimal becomes 0.
 */
export function extractNumericValue(value: unknown): number {
  if (value === null || value === undefined) return 0;
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value !== "string") return 0;

  const cleaned = value.replace(/[R$,\s]/g, "");
  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) return 0;
  return parseFloat(cleaned);
}

/**
 * Transfer duty on a purchase price. Brackets are tested in order and the
 * first bracket whose inclusive upper bound covers the price is applied.
 */
export function calculateTransferDuty(
  price: unknown,
  brackets: TransferDutyBracket[] = DEFAULT_FINANCE_CONFIG.transferDutyBrackets
): number {
  const priceNum = extractNumericValue(price);
  if (priceNum <= 0 || brackets.length === 0) return 0;

  const bracket =
    brackets.find((b) => priceNum <= b.upTo) ?? brackets[brackets.length - 1];
  if (!bracket) return 0;

  return bracket.base + (priceNum - bracket.over) * bracket.rate;
}

/**
 * Fixed monthly repayment that amortizes `principal` over `years` at an
 * annual `rate` compounded monthly.
 */
export function calculateBondPayment(
  principal: number,
  rate: number = DEFAULT_FINANCE_CONFIG.interestRate,
  years: number = DEFAULT_FINANCE_CONFIG.bondTermYears
): number {
  if (!Number.isFinite(principal) || principal <= 0) return 0;
  if (!Number.isFinite(rate) || !Number.isFinite(years)) return 0;

  const numPayments = years * 12;
  if (numPayments <= 0) return 0;

  const monthlyRate = rate / 12;
  if (monthlyRate === 0) {
    return principal / numPayments;
  }

  const growth = Math.pow(1 + monthlyRate, numPayments);
  return (principal * (monthlyRate * growth)) / (growth - 1);
}

export function calculateBondAmount(price: unknown): number {
  const priceNum = extractNumericValue(price);
  return priceNum - priceNum * DEPOSIT_RATE;
}

export function calculateOnceOffCosts(
  price: unknown,
  config: FinanceConfig = DEFAULT_FINANCE_CONFIG
): OnceOffCosts {
  const priceNum = extractNumericValue(price);
  const deposit = priceNum * DEPOSIT_RATE;
  const bondAmount = priceNum - deposit;

  const transferDuty = calculateTransferDuty(
    priceNum,
    config.transferDutyBrackets
  );
  const bondRegistration = bondAmount * BOND_REGISTRATION_RATE;
  const transferCosts = priceNum * TRANSFER_COSTS_RATE;
  const attorneyFees = priceNum * ATTORNEY_FEES_RATE;
  const bondOrigination = bondAmount * BOND_ORIGINATION_RATE;
  const movingCosts = priceNum * MOVING_COSTS_RATE;
  const securitySetup = priceNum * SECURITY_SETUP_RATE;
  const immediateRepairs = priceNum * IMMEDIATE_REPAIRS_RATE;

  const total =
    deposit +
    transferDuty +
    bondRegistration +
    transferCosts +
    attorneyFees +
    bondOrigination +
    movingCosts +
    securitySetup +
    immediateRepairs;

  return {
    deposit,
    transferDuty,
    bondRegistration,
    transferCosts,
    attorneyFees,
    bondOrigination,
    movingCosts,
    securitySetup,
    immediateRepairs,
    total,
    grandTotal: priceNum + total,
  };
}

function clamp(value: number, lower: number, upper: number): number {
  return Math.max(lower, Math.min(value, upper));
}

export function calculateMonthlyCosts(
  input: MonthlyCostInput,
  config: FinanceConfig = DEFAULT_FINANCE_CONFIG
): MonthlyCosts {
  const { bondAmount, price } = input;
  const items = config.monthlyItems;

  const bondPayment = calculateBondPayment(
    bondAmount,
    config.interestRate,
    config.bondTermYears
  );
  const levies = extractNumericValue(input.levies);
  const ratesTaxes = extractNumericValue(input.ratesTaxes);

  const insurance = items.insurance ? (bondAmount * INSURANCE_RATE) / 12 : 0;
  const maintenance = items.maintenance
    ? (price * MAINTENANCE_RATE) / 12
    : 0;
  const utilities = items.utilities
    ? clamp(price * UTILITIES_RATE, UTILITIES_MIN, UTILITIES_MAX)
    : 0;
  const security = items.security
    ? clamp(price * SECURITY_RATE, SECURITY_MIN, SECURITY_MAX)
    : 0;

  const total =
    bondPayment +
    levies +
    ratesTaxes +
    insurance +
    maintenance +
    utilities +
    security;

  return {
    bondPayment,
    levies,
    ratesTaxes,
    insurance,
    maintenance,
    utilities,
    security,
    total,
  };
}
