import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { DEFAULT_MISSION_PARAMETERS } from "../src/mission-schema";
import { MissionParameterStore } from "../src/parameter-store";

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("MissionParameterStore", () => {
  it("reads the default ontology values", () => {
    const store = new MissionParameterStore();
    expect(store.params).toEqual(DEFAULT_MISSION_PARAMETERS);
  });

  it("overrides a single value through the ontology", () => {
    const store = new MissionParameterStore();

    store.setParameter("urbanMoveCost", 4);
    store.setParameter("lowBatteryRatio", 0.25);

    expect(store.params.energy).toEqual({ moveCost: 1, urbanMoveCost: 4, collectCost: 1 });
    expect(store.params.decision.lowBatteryRatio).toBe(0.25);
    expect(store.params.decision.targetReward).toBe(100);
  });

  it("rejects unknown names and non-finite values", () => {
    const store = new MissionParameterStore();

    expect(() => store.setParameter("warpSpeed", 9)).toThrow("Unknown mission parameter: warpSpeed");
    expect(() => store.setParameter("moveCost", Number.NaN)).toThrow("Parameter moveCost must be a finite number, got NaN");
  });

  it("rejects values outside each parameter's range and keeps the previous value", () => {
    const store = new MissionParameterStore();

    expect(() => store.setParameter("moveCost", -1)).toThrow("Parameter moveCost must be at least 1, got -1");
    expect(() => store.setParameter("urbanMoveCost", 0.5)).toThrow("Parameter urbanMoveCost must be at least 1, got 0.5");
    expect(() => store.setParameter("collectCost", -1)).toThrow("Parameter collectCost must be at least 0, got -1");
    expect(() => store.setParameter("lowBatteryRatio", 0)).toThrow(
      "Parameter lowBatteryRatio must be greater than 0, got 0"
    );
    expect(() => store.setParameter("sampleRadius", -2)).toThrow("Parameter sampleRadius must be greater than 0, got -2");

    expect(store.params).toEqual(DEFAULT_MISSION_PARAMETERS);
  });

  it("accepts the lowest allowed costs", () => {
    const store = new MissionParameterStore();

    store.setParameter("moveCost", 1);
    store.setParameter("collectCost", 0);

    expect(store.params.energy).toEqual({ moveCost: 1, urbanMoveCost: 3, collectCost: 0 });
  });

  it("falls back to the built-in defaults when no configuration is loaded", () => {
    const store = new MissionParameterStore();
    store.clearConfigurations();

    expect(store.params).toEqual(DEFAULT_MISSION_PARAMETERS);
    expect(store.params).not.toBe(DEFAULT_MISSION_PARAMETERS);
    expect(console.warn).toHaveBeenCalledWith("[Parameters] No mission parameters found in ontology, using defaults");
    expect(store.getAllConfigurations()).toEqual([]);
  });

  it("lists each configuration with its properties", () => {
    const store = new MissionParameterStore();
    store.setParameter("moveCost", 2);

    const energy = store.getAllConfigurations().find((c) => c.configId === "DefaultEnergyConfig");

    expect(energy?.properties.map((p) => [p.name, Number(p.value)])).toEqual([
      ["collectCost", 1],
      ["moveCost", 2],
      ["urbanMoveCost", 3],
    ]);
  });
});
