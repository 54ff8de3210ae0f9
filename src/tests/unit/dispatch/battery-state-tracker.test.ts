import { describe, it, expect } from "@effect/vitest";
import { BatteryStateTracker } from "../../../dispatch/battery-state-tracker.js";
import { batteryWearIncrement } from "../../../dispatch/fuel-and-wear.js";
import { dispatchDefaults } from "../../../config.js";

describe("BatteryStateTracker", () => {
  const makeBattery = (capacityKwh = 100, initialSoc = 0.5) =>
    new BatteryStateTracker(capacityKwh, dispatchDefaults, initialSoc);

  it("should clamp the initial state of charge", () => {
    expect(makeBattery(100, 1.5).soc).toBe(1);
    expect(makeBattery(100, -0.2).soc).toBe(0);
  });

  describe("applySelfDischarge", () => {
    it("should lose a fixed fraction of the stored charge", () => {
      const battery = makeBattery();
      const lostKwh = battery.applySelfDischarge();

      expect(battery.soc).toBeCloseTo(0.4999, 12);
      expect(lostKwh).toBeCloseTo(0.01, 12);
      expect(battery.snapshot().dailyThroughput).toBeCloseTo(0.0001, 12);
    });
  });

  describe("charge", () => {
    it("should absorb the full request when there is headroom", () => {
      const battery = makeBattery();
      const outcome = battery.charge(10);

      expect(outcome).toEqual({ absorbedKwh: 10, rejectedKwh: 0 });
      expect(battery.soc).toBeCloseTo(0.5938, 12);
    });

    it("should reject what does not fit and stop at full", () => {
      const battery = makeBattery();
      const outcome = battery.charge(100);

      expect(outcome.absorbedKwh).toBeCloseTo(50 / 0.938, 9);
      expect(outcome.rejectedKwh).toBeCloseTo(100 - 50 / 0.938, 9);
      expect(battery.soc).toBeCloseTo(1, 12);
      expect(battery.soc).toBeLessThanOrEqual(1);
    });

    it("should reject everything without capacity", () => {
      const battery = makeBattery(0);
      expect(battery.charge(5)).toEqual({ absorbedKwh: 0, rejectedKwh: 5 });
      expect(battery.soc).toBe(0.5);
    });
  });

  describe("discharge", () => {
    it("should deliver the request and draw efficiency losses from the bank", () => {
      const battery = makeBattery();
      const outcome = battery.discharge(10);

      expect(outcome).toEqual({ deliveredKwh: 10, shortfallKwh: 0, floorRestoredKwh: 0 });
      expect(battery.soc).toBeCloseTo(0.39339019189765456, 12);
    });

    it("should stop at the depth-of-discharge floor and report the shortfall", () => {
      const battery = makeBattery();
      const outcome = battery.discharge(50);

      // (0.5 - 0.2) x 100 kWh x 0.938
      expect(outcome.deliveredKwh).toBeCloseTo(28.14, 9);
      expect(outcome.shortfallKwh).toBeCloseTo(21.86, 9);
      expect(battery.soc).toBeCloseTo(0.2, 12);
      expect(battery.soc).toBeGreaterThanOrEqual(battery.socFloor);
    });

    it("should deliver nothing from a bank already at its floor", () => {
      const battery = makeBattery(100, 1 - dispatchDefaults.batteryDodMax);
      expect(battery.discharge(5)).toEqual({ deliveredKwh: 0, shortfallKwh: 5, floorRestoredKwh: 0 });
      expect(battery.soc).toBe(battery.socFloor);
    });

    it("should book the self-discharge loss under the floor as shortfall, not as negative delivery", () => {
      const battery = makeBattery(600, 1 - dispatchDefaults.batteryDodMax);
      battery.applySelfDischarge();

      const outcome = battery.discharge(50);

      // floor x 0.0002 x 600 kWh x 0.938
      expect(outcome.deliveredKwh).toBe(0);
      expect(outcome.floorRestoredKwh).toBeCloseTo(0.022512, 9);
      expect(outcome.shortfallKwh).toBeCloseTo(50.022512, 9);
      expect(battery.soc).toBe(battery.socFloor);
    });

    it("should lift a bank that starts under its floor back to the floor", () => {
      const battery = makeBattery(100, 0.1);

      const outcome = battery.discharge(5);

      expect(outcome.deliveredKwh).toBe(0);
      expect(outcome.floorRestoredKwh).toBeCloseTo(9.38, 9);
      expect(outcome.shortfallKwh).toBeCloseTo(14.38, 9);
      expect(battery.soc).toBe(battery.socFloor);
    });

    it("should report the whole request as shortfall without capacity", () => {
      const battery = makeBattery(0);
      expect(battery.discharge(5)).toEqual({ deliveredKwh: 0, shortfallKwh: 5, floorRestoredKwh: 0 });
    });
  });

  describe("energy views", () => {
    it("should expose stored, usable and headroom energy", () => {
      const battery = makeBattery();

      expect(battery.storedEnergyKwh).toBeCloseTo(46.9, 12);
      expect(battery.usableEnergyKwh).toBeCloseTo(28.14, 12);
      expect(battery.headroomKwh).toBeCloseTo(50, 12);
    });

    it("should expose nothing without capacity", () => {
      const battery = makeBattery(0);

      expect(battery.storedEnergyKwh).toBe(0);
      expect(battery.usableEnergyKwh).toBe(0);
      expect(battery.headroomKwh).toBe(0);
    });
  });

  describe("closeDay", () => {
    it("should convert the day's throughput into wear and reset the day", () => {
      const battery = makeBattery();
      battery.discharge(10);
      battery.recordDepth();
      const day = battery.snapshot();

      const increment = battery.closeDay();

      expect(increment).toBe(batteryWearIncrement(day.dailyThroughput, day.dailyMaxDod, dispatchDefaults));
      expect(increment).toBeGreaterThan(0);
      expect(battery.snapshot()).toEqual({
        soc: day.soc,
        dailyThroughput: 0,
        dailyMaxDod: 0,
        wearCycles: increment,
      });
    });

    it("should add no wear to a bank without capacity", () => {
      const battery = makeBattery(0);
      battery.applySelfDischarge();
      battery.recordDepth();

      expect(battery.closeDay()).toBe(0);
      expect(battery.wearCycles).toBe(0);
    });

    it("should add no wear on a day that never left full charge", () => {
      const battery = makeBattery(100, 1);
      battery.recordDepth();

      expect(battery.closeDay()).toBe(0);
    });
  });
});
