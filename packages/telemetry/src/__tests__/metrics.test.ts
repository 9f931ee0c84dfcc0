import { describe, expect, it } from "vitest";
import {
  getBreakerTransitions,
  getCostTotal,
  getRouterAttempts,
  getRouterLatency,
  getTokenUsage,
} from "../metrics.js";

describe("router metrics", () => {
  it("creates each instrument once", () => {
    expect(getRouterAttempts()).toBe(getRouterAttempts());
    expect(getRouterLatency()).toBe(getRouterLatency());
    expect(getTokenUsage()).toBe(getTokenUsage());
    expect(getCostTotal()).toBe(getCostTotal());
    expect(getBreakerTransitions()).toBe(getBreakerTransitions());
  });

  it("accepts recordings without a registered meter provider", () => {
    expect(() => {
      getRouterAttempts().add(1, { provider: "p1", outcome: "success" });
      getRouterLatency().record(120, { provider: "p1" });
      getBreakerTransitions().add(1, { provider: "p1", from: "closed", to: "open" });
    }).not.toThrow();
  });
});
