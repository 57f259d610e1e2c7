/**
 * Derived rental-income and tax figures.
 *
 * Rates and classifications are fixed tables; given the same child list the
 * totals are always the same. Every amount is >= 0.
 */

import { readText, type JsonObject } from "../../db/json.js";

import type { PersonDetailDocument } from "./aggregate.js";
import type { OwnerStatus } from "../../db/types.js";

// ============================================================================
// Static Tables
// ============================================================================

export type Currency = "dalasi" | "usd" | "euro" | "pounds";

export const EXCHANGE_RATES_TO_GMD: Readonly<Record<Currency, number>> = {
  dalasi: 1.0,
  euro: 76.92,
  usd: 71.43,
  pounds: 90.91,
};

const CURRENCY_ALIASES: Readonly<Record<string, Currency>> = {
  dalasi: "dalasi",
  gmd: "dalasi",
  usd: "usd",
  dollar: "usd",
  $: "usd",
  euro: "euro",
  eur: "euro",
  "€": "euro",
  pound: "pounds",
  pounds: "pounds",
  gbp: "pounds",
  "£": "pounds",
};

export type PropertyUse = "place-of-business" | "residence";

const BUSINESS_USES = new Set([
  "place-of-business",
  "commercial",
  "business",
  "shop",
  "office",
]);

export type OccupancyBasis = "owner" | "landlord" | "occupant";

const OWNER_BASES = new Set(["owner", "proprietor"]);
const LANDLORD_BASES = new Set(["landlord", "agent"]);

export type IncomeType = "commercial" | "residential_rental" | "business";

export const TAX_RATES: Readonly<Record<IncomeType, number>> = {
  commercial: 0.15,
  residential_rental: 0.08,
  business: 0.27,
};

export const MAX_ANNUAL_RENT = 10_000_000;

const AMOUNT_PATTERN = /^\d+\.?\d*$/;

// ============================================================================
// Classification
// ============================================================================

function normalizedText(value: unknown): string | null {
  return readText(value)?.toLowerCase() ?? null;
}

/**
 * Parse a non-negative decimal amount; anything else is null
 */
export function parseAmount(value: unknown): number | null {
  const text = readText(value);
  if (text === null || !AMOUNT_PATTERN.test(text)) return null;
  return Number(text);
}

/**
 * Annual rent in the original currency: positive and at most 10M, else 0
 */
export function parseAnnualRent(value: unknown): number {
  const amount = parseAmount(value);
  if (amount === null || amount <= 0 || amount > MAX_ANNUAL_RENT) return 0;
  return amount;
}

export function normalizeCurrency(value: unknown): Currency {
  const text = normalizedText(value);
  return (text !== null ? CURRENCY_ALIASES[text] : undefined) ?? "dalasi";
}

export function classifyPropertyUse(value: unknown): PropertyUse {
  const text = normalizedText(value);
  return text !== null && BUSINESS_USES.has(text)
    ? "place-of-business"
    : "residence";
}

export function classifyBasis(value: unknown): OccupancyBasis {
  const text = normalizedText(value);
  if (text !== null && OWNER_BASES.has(text)) return "owner";
  if (text !== null && LANDLORD_BASES.has(text)) return "landlord";
  return "occupant";
}

// `business` has a rate but no use maps to it
export function incomeTypeFor(use: PropertyUse): IncomeType {
  return use === "place-of-business" ? "commercial" : "residential_rental";
}

export function roundMoney(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function formatGmd(amount: number): string {
  return `GMD ${amount.toLocaleString("en-US", {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  })}`;
}

// ============================================================================
// Per-child and per-parent derivation
// ============================================================================

export interface ChildDerivation {
  currency: Currency;
  annualRent: number;
  annualRentGmd: number;
  propertyUse: PropertyUse;
  basis: OccupancyBasis;
  incomeType: IncomeType;
}

export function deriveChild(person: PersonDetailDocument): ChildDerivation {
  const occupancy = person.occupancy;
  const currency = normalizeCurrency(
    occupancy.rent_currency_unit ?? occupancy.currency_unit
  );
  const annualRent = parseAnnualRent(occupancy.rent_annual_amount);
  const propertyUse = classifyPropertyUse(occupancy.property_use);

  return {
    currency,
    annualRent,
    annualRentGmd: annualRent * EXCHANGE_RATES_TO_GMD[currency],
    propertyUse,
    basis: classifyBasis(person.person_type.property_basis),
    incomeType: incomeTypeFor(propertyUse),
  };
}

export interface DerivedTotals {
  total_rent_gmd: number;
  commercial_income: number;
  residential_income: number;
  business_income: number;
  commercial_tax: number;
  residential_tax: number;
  business_tax: number;
  total_tax_liability: number;
  amount_paid: number;
  owner_status: OwnerStatus;
}

export type DeriveTotals = (
  persons: PersonDetailDocument[],
  endSection: JsonObject | null
) => DerivedTotals;

/**
 * Sum the children of one parent. Rounding happens once, on the sums.
 */
export const deriveTotals: DeriveTotals = (persons, endSection) => {
  const income: Record<IncomeType, number> = {
    commercial: 0,
    residential_rental: 0,
    business: 0,
  };
  let hasOwner = false;

  for (const person of persons) {
    const derived = deriveChild(person);
    income[derived.incomeType] += derived.annualRentGmd;
    hasOwner ||= derived.basis === "owner";
  }

  const tax = {
    commercial: income.commercial * TAX_RATES.commercial,
    residential_rental:
      income.residential_rental * TAX_RATES.residential_rental,
    business: income.business * TAX_RATES.business,
  };

  return {
    total_rent_gmd: roundMoney(
      income.commercial + income.residential_rental + income.business
    ),
    commercial_income: roundMoney(income.commercial),
    residential_income: roundMoney(income.residential_rental),
    business_income: roundMoney(income.business),
    commercial_tax: roundMoney(tax.commercial),
    residential_tax: roundMoney(tax.residential_rental),
    business_tax: roundMoney(tax.business),
    total_tax_liability: roundMoney(
      tax.commercial + tax.residential_rental + tax.business
    ),
    amount_paid: parseAmount(endSection?.amount_paid) ?? 0,
    owner_status: hasOwner ? "Owner" : "No Owner",
  };
};
