/**
 * Tests for environment configuration.
 */

import { describe, it, expect } from "vitest";
import { loadConfig, protocolParameters } from "../src/config.js";

const WETH = JSON.stringify([{ id: "wETH", decimals: 18, price: "2000" }]);

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.BOOTSTRAP_PERIOD_SECONDS).toBe(1209600);
    expect(config.COLLATERALS).toEqual([]);
    expect(config.MCR).toBeUndefined();
  });

  it("parses decimal parameters into 18-decimal values", () => {
    const config = loadConfig({ MCR: "1.2", MIN_NET_DEBT: "1000" });

    expect(config.MCR).toBe(1200000000000000000n);
    expect(config.MIN_NET_DEBT).toBe(1000n * 10n ** 18n);
  });

  it("seeds collateral types with curve defaults", () => {
    const config = loadConfig({ COLLATERALS: WETH });

    expect(config.COLLATERALS).toHaveLength(1);
    const [seed] = config.COLLATERALS;
    expect(seed?.price).toBe(2000n * 10n ** 18n);
    expect(seed?.safetyRatio).toBe(10n ** 18n);
    expect(seed?.active).toBe(true);
    expect(seed?.wrapped).toBe(false);
    expect(seed?.feeCurve).toEqual({
      m1: 0n,
      b1: 5000000000000000n,
      cutoff1: 500000000000000000n,
      m2: 0n,
      cutoff2: 800000000000000000n,
      m3: 0n,
      dollarCap: 0n,
      decayWindow: 3600,
    });
  });

  it("rejects COLLATERALS that is not JSON", () => {
    expect(() => loadConfig({ COLLATERALS: "[wETH" })).toThrow("COLLATERALS must be valid JSON");
  });

  it("rejects a collateral without a price", () => {
    expect(() => loadConfig({ COLLATERALS: JSON.stringify([{ id: "wETH", decimals: 18 }]) })).toThrow();
  });

  it("rejects a negative ratio", () => {
    expect(() => loadConfig({ MCR: "-1.1" })).toThrow();
  });

  it("rejects a port out of range", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
  });
});

describe("protocolParameters", () => {
  it("keeps only the parameters that are set", () => {
    const params = protocolParameters(loadConfig({ CCR: "1.6", BOOTSTRAP_PERIOD_SECONDS: "0" }));

    expect(params).toEqual({ ccr: 1600000000000000000n, bootstrapPeriod: 0 });
  });
});
