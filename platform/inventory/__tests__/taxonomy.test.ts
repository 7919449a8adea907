import { describe, it, expect } from "vitest";
import { ASSET_TYPES, parseAssetType, isAssetType } from "@shared/assetTypes";
import { assertValidHierarchy, canHaveBom, rank, validate } from "../engine/taxonomy";
import { InvalidHierarchy } from "../service/errors";

describe("taxonomy", () => {
  describe("rank", () => {
    it("orders the tiers from domain down to the CI variants", () => {
      expect(ASSET_TYPES.map(rank)).toEqual([1, 2, 3, 4, 5, 6, 6, 6]);
    });
  });

  describe("validate", () => {
    it("accepts a child one tier below its parent", () => {
      expect(validate("System / Environment", "Subsystem / Service")).toBe(true);
    });

    it("accepts skipped tiers", () => {
      expect(validate("Domain / System of Systems", "Hardware CI")).toBe(true);
    });

    it("rejects a child that ranks above its parent", () => {
      expect(validate("Component / Segment", "System / Environment")).toBe(false);
    });

    it("rejects same-rank pairs", () => {
      expect(validate("Hardware CI", "Firmware CI")).toBe(false);
      expect(validate("Component / Segment", "Component / Segment")).toBe(false);
    });

    it("rejects every pair where the child ranks above the parent", () => {
      for (const parent of ASSET_TYPES) {
        for (const child of ASSET_TYPES) {
          if (rank(child) < rank(parent)) {
            expect(() => assertValidHierarchy(parent, child)).toThrow(InvalidHierarchy);
          }
        }
      }
    });
  });

  describe("assertValidHierarchy", () => {
    it("names both types and ranks in the error", () => {
      expect(() => assertValidHierarchy("Configuration Item (CI)", "Subsystem / Service")).toThrow(
        '"Subsystem / Service" (rank 3) ranks above parent type "Configuration Item (CI)" (rank 5)',
      );
    });

    it("reports same-rank pairs distinctly", () => {
      expect(() => assertValidHierarchy("Software CI", "Hardware CI")).toThrow(
        '"Hardware CI" (rank 6) shares rank with parent type "Software CI" (rank 6)',
      );
    });

    it("carries the INVALID_HIERARCHY code", () => {
      try {
        assertValidHierarchy("Firmware CI", "Domain / System of Systems");
        expect.unreachable();
      } catch (e) {
        expect(e).toBeInstanceOf(InvalidHierarchy);
        expect(e).toHaveProperty("code", "INVALID_HIERARCHY");
      }
    });
  });

  it("only the domain tier cannot carry a BOM", () => {
    expect(ASSET_TYPES.filter((t) => !canHaveBom(t))).toEqual(["Domain / System of Systems"]);
  });

  describe("parseAssetType", () => {
    it("matches exact names", () => {
      expect(parseAssetType("Firmware CI")).toBe("Firmware CI");
    });

    it("matches case-insensitively after trimming", () => {
      expect(parseAssetType("  hardware ci ")).toBe("Hardware CI");
    });

    it("accepts the short subsystem alias", () => {
      expect(parseAssetType("Subsystem")).toBe("Subsystem / Service");
    });

    it("returns null for unknown labels", () => {
      expect(parseAssetType("Rack")).toBeNull();
      expect(isAssetType("Rack")).toBe(false);
    });
  });
});
