import { describe, it, expect } from "vitest";

import { readScalarFields } from "../../../../src/odk/parser.js";
import {
  classifyBasis,
  classifyPropertyUse,
  deriveChild,
  deriveTotals,
  formatGmd,
  normalizeCurrency,
  parseAmount,
  parseAnnualRent,
  roundMoney,
} from "../../../../src/services/unified/derive.js";

import type { PersonDetailDocument } from "../../../../src/services/unified/aggregate.js";

function person(
  uuid: string,
  occupancy: Record<string, unknown>,
  personType: Record<string, unknown> = {}
): PersonDetailDocument {
  return {
    uuid,
    person_type: personType,
    ...readScalarFields({}),
    occupancy,
  };
}

describe("services/unified/derive", () => {
  describe("parseAmount", () => {
    it("should parse plain decimals", () => {
      expect(parseAmount("1500")).toBe(1500);
      expect(parseAmount("12.50")).toBe(12.5);
      expect(parseAmount(300)).toBe(300);
    });

    it("should reject signs, separators and text", () => {
      expect(parseAmount("-5")).toBeNull();
      expect(parseAmount("1,000")).toBeNull();
      expect(parseAmount("abc")).toBeNull();
      expect(parseAmount(null)).toBeNull();
    });
  });

  describe("parseAnnualRent", () => {
    it("should accept amounts up to ten million", () => {
      expect(parseAnnualRent("10000000")).toBe(10_000_000);
    });

    it("should zero out implausible amounts", () => {
      expect(parseAnnualRent("10000001")).toBe(0);
      expect(parseAnnualRent("0")).toBe(0);
      expect(parseAnnualRent("n/a")).toBe(0);
    });
  });

  describe("classification", () => {
    it("should normalize currency aliases and default to dalasi", () => {
      expect(normalizeCurrency("USD")).toBe("usd");
      expect(normalizeCurrency("eur")).toBe("euro");
      expect(normalizeCurrency("GBP")).toBe("pounds");
      expect(normalizeCurrency("cowrie")).toBe("dalasi");
      expect(normalizeCurrency(undefined)).toBe("dalasi");
    });

    it("should classify business uses and default to residence", () => {
      expect(classifyPropertyUse("Shop")).toBe("place-of-business");
      expect(classifyPropertyUse("place-of-business")).toBe("place-of-business");
      expect(classifyPropertyUse("home")).toBe("residence");
      expect(classifyPropertyUse(null)).toBe("residence");
    });

    it("should classify occupancy basis", () => {
      expect(classifyBasis("Proprietor")).toBe("owner");
      expect(classifyBasis("agent")).toBe("landlord");
      expect(classifyBasis("tenant")).toBe("occupant");
    });
  });

  describe("deriveChild", () => {
    it("should convert rent to GMD using the currency unit fallback", () => {
      const derived = deriveChild(
        person("a", { rent_annual_amount: "200", currency_unit: "euro", property_use: "office" })
      );

      expect(derived.currency).toBe("euro");
      expect(derived.annualRent).toBe(200);
      expect(derived.annualRentGmd).toBeCloseTo(15_384, 6);
      expect(derived.incomeType).toBe("commercial");
    });

    it("should prefer rent_currency_unit over currency_unit", () => {
      const derived = deriveChild(
        person("a", { rent_annual_amount: "10", rent_currency_unit: "usd", currency_unit: "euro" })
      );

      expect(derived.currency).toBe("usd");
    });
  });

  describe("deriveTotals", () => {
    it("should sum children, convert currencies and tax residential rent", () => {
      const totals = deriveTotals(
        [
          person("a", { rent_annual_amount: "1000", rent_currency_unit: "dalasi" }),
          person("b", { rent_annual_amount: "500", currency_unit: "usd" }),
        ],
        null
      );

      expect(totals).toEqual({
        total_rent_gmd: 36715,
        commercial_income: 0,
        residential_income: 36715,
        business_income: 0,
        commercial_tax: 0,
        residential_tax: 2937.2,
        business_tax: 0,
        total_tax_liability: 2937.2,
        amount_paid: 0,
        owner_status: "No Owner",
      });
    });

    it("should split commercial and residential income", () => {
      const totals = deriveTotals(
        [
          person("a", { rent_annual_amount: "1000", property_use: "shop" }),
          person("b", { rent_annual_amount: "2000", property_use: "residence" }),
        ],
        { amount_paid: "150" }
      );

      expect(totals.commercial_income).toBe(1000);
      expect(totals.commercial_tax).toBe(150);
      expect(totals.residential_income).toBe(2000);
      expect(totals.residential_tax).toBe(160);
      expect(totals.total_tax_liability).toBe(310);
      expect(totals.amount_paid).toBe(150);
    });

    it("should report an owner when any child's basis is owner", () => {
      const totals = deriveTotals(
        [person("a", {}, { property_basis: "tenant" }), person("b", {}, { property_basis: "owner" })],
        null
      );

      expect(totals.owner_status).toBe("Owner");
    });

    it("should return zeros for a parent without children", () => {
      const totals = deriveTotals([], { amount_paid: "-20" });

      expect(totals.total_rent_gmd).toBe(0);
      expect(totals.total_tax_liability).toBe(0);
      expect(totals.amount_paid).toBe(0);
      expect(totals.owner_status).toBe("No Owner");
    });

    it("should be deterministic for the same input", () => {
      const persons = [person("a", { rent_annual_amount: "333.33", currency_unit: "pounds" })];

      expect(deriveTotals(persons, null)).toEqual(deriveTotals(persons, null));
    });
  });

  describe("formatting", () => {
    it("should round to two decimals", () => {
      expect(roundMoney(1.999)).toBe(2);
      expect(roundMoney(15.384)).toBe(15.38);
      expect(roundMoney(2937.2000000001)).toBe(2937.2);
    });

    it("should format GMD amounts with grouping", () => {
      expect(formatGmd(36715)).toBe("GMD 36,715.00");
      expect(formatGmd(2937.2)).toBe("GMD 2,937.20");
    });
  });
});
