import {
  FlightStateManager,
  etaModeForPhase,
  type ETAModeChange,
  type PhaseChange,
} from "../state-manager";
import { at, eastboundRoute, manualClock, silenceConsole } from "../../__tests__/fixtures";

describe("etaModeForPhase", () => {
  test("should anticipate before departure and estimate afterwards", () => {
    expect(etaModeForPhase("pre_departure")).toBe("anticipated");
    expect(etaModeForPhase("in_flight")).toBe("estimated");
    expect(etaModeForPhase("post_arrival")).toBe("estimated");
  });
});

describe("FlightStateManager", () => {
  let clock: ReturnType<typeof manualClock>;
  let manager: FlightStateManager;
  let spies: ReturnType<typeof silenceConsole>;

  beforeEach(() => {
    spies = silenceConsole();
    clock = manualClock();
    manager = new FlightStateManager({ now: clock.now });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("should start before departure in anticipated mode", () => {
    const status = manager.getStatus();
    expect(status.phase).toBe("pre_departure");
    expect(status.etaMode).toBe("anticipated");
    expect(status.departureTime).toBeNull();
    expect(status.timeUntilDepartureSeconds).toBeNull();
    expect(Object.isFrozen(status)).toBe(true);
  });

  describe("departure detection", () => {
    test("should require speed above threshold for the persistence window", () => {
      expect(manager.checkDeparture(60, at(0, 0))).toBe(false);
      expect(manager.checkDeparture(60, at(0, 5))).toBe(false);
      expect(manager.getStatus().speedPersistenceSeconds).toBe(5);
      expect(manager.checkDeparture(60, at(0, 10))).toBe(true);

      const status = manager.getStatus();
      expect(status.phase).toBe("in_flight");
      expect(status.etaMode).toBe("estimated");
      expect(status.departureTime).toEqual(at(0, 10));
      expect(status.speedPersistenceSeconds).toBe(0);
      expect(spies.log).toHaveBeenCalledWith("[FLIGHT STATE] pre_departure → in_flight (departure detected)");
    });

    test("should restart persistence when speed dips", () => {
      manager.checkDeparture(60, at(0, 0));
      manager.checkDeparture(40, at(0, 5));
      manager.checkDeparture(60, at(0, 6));
      expect(manager.checkDeparture(60, at(0, 15))).toBe(false);
      expect(manager.checkDeparture(60, at(0, 16))).toBe(true);
    });

    test("should not count a speed exactly at threshold", () => {
      manager.checkDeparture(50, at(0, 0));
      expect(manager.checkDeparture(50, at(1, 0))).toBe(false);
      expect(manager.getStatus().speedPersistenceSeconds).toBe(0);
    });

    test("should record the check time even once departed", () => {
      manager.triggerDeparture(at(0));
      expect(manager.checkDeparture(80, at(5))).toBe(false);
      expect(manager.getStatus().lastDepartureCheckAt).toEqual(at(5));
    });

    test("should ignore non-finite speeds", () => {
      expect(manager.checkDeparture(Number.NaN, at(0))).toBe(false);
      expect(manager.getStatus().lastDepartureCheckAt).toBeNull();
      expect(spies.warn).toHaveBeenCalledWith("[FLIGHT STATE] Ignoring departure check with speed NaN");
    });

    test("should honour custom thresholds", () => {
      const eager = new FlightStateManager({
        now: clock.now,
        thresholds: { departureSpeedKnots: 20, departurePersistenceSeconds: 0 },
      });
      expect(eager.checkDeparture(21, at(0))).toBe(true);
      expect(eager.thresholds.arrivalDwellSeconds).toBe(60);
    });
  });

  describe("telemetry", () => {
    test("should depart after ten seconds of sustained takeoff speed", () => {
      for (let second = 0; second < 10; second++) {
        expect(manager.ingestTelemetry({ speedKnots: 0, timestamp: at(0, second) })).toBe(false);
      }
      expect(manager.ingestTelemetry({ speedKnots: 10, timestamp: at(0, 10) })).toBe(false);

      const results: boolean[] = [];
      for (let second = 11; second <= 21; second++) {
        results.push(manager.ingestTelemetry({ speedKnots: 60, timestamp: at(0, second) }));
      }
      expect(results.indexOf(true)).toBe(10);
      expect(results.filter(Boolean)).toHaveLength(1);
      expect(manager.getStatus().departureTime).toEqual(at(0, 21));

      manager.ingestTelemetry({ speedKnots: 60, timestamp: at(0, 30) });
      manager.triggerDeparture(at(1));
      expect(manager.getStatus().departureTime).toEqual(at(0, 21));
    });

    test("should accept ISO timestamps and fall back to the clock", () => {
      manager.ingestTelemetry({ speedKnots: 70, timestamp: at(0).toISOString() });
      clock.set(at(0, 12));
      expect(manager.ingestTelemetry({ speedKnots: 70 })).toBe(true);
      expect(manager.getStatus().departureTime).toEqual(at(0, 12));
    });

    test("should use distance to destination for arrival once in flight", () => {
      manager.triggerDeparture(at(0));
      expect(manager.ingestTelemetry({ speedKnots: 5, timestamp: at(10) })).toBe(false);
      manager.ingestTelemetry({ speedKnots: 5, distanceToDestinationMeters: 50, timestamp: at(10) });
      expect(
        manager.ingestTelemetry({ speedKnots: 5, distanceToDestinationMeters: 40, timestamp: at(11) }),
      ).toBe(true);
      expect(manager.getStatus().phase).toBe("post_arrival");
      expect(manager.ingestTelemetry({ speedKnots: 5, distanceToDestinationMeters: 0 })).toBe(false);
    });

    test("should reject malformed ticks without touching state", () => {
      expect(manager.ingestTelemetry({ speedKnots: "fast" })).toBe(false);
      expect(manager.ingestTelemetry(null)).toBe(false);
      expect(manager.getStatus().lastDepartureCheckAt).toBeNull();
      expect(spies.warn).toHaveBeenCalledWith(
        "[FLIGHT STATE] Rejected telemetry tick: speedKnots: Expected number, received string",
      );
    });
  });

  describe("arrival detection", () => {
    beforeEach(() => {
      manager.triggerDeparture(at(0));
    });

    test("should require the dwell window inside the arrival radius", () => {
      expect(manager.checkArrival(80, 10, at(10, 0))).toBe(false);
      expect(manager.checkArrival(80, 10, at(10, 59))).toBe(false);
      expect(manager.getStatus().arrivalDwellSeconds).toBe(59);
      expect(manager.checkArrival(80, 10, at(11, 0))).toBe(true);

      const status = manager.getStatus();
      expect(status.phase).toBe("post_arrival");
      expect(status.arrivalTime).toEqual(at(11));
      expect(status.departureTime).toEqual(at(0));
      expect(spies.log).toHaveBeenCalledWith(
        "[FLIGHT STATE] in_flight → post_arrival (arrival detected at 10 kn)",
      );
    });

    test("should restart the dwell when the aircraft leaves the radius", () => {
      manager.checkArrival(80, 10, at(10, 0));
      manager.checkArrival(150, 10, at(10, 30));
      manager.checkArrival(80, 10, at(10, 31));
      expect(manager.checkArrival(80, 10, at(11, 0))).toBe(false);
      expect(manager.checkArrival(80, 10, at(11, 31))).toBe(true);
    });

    test("should not detect arrival before departure", () => {
      manager.reset();
      expect(manager.checkArrival(0, 0, at(20))).toBe(false);
      expect(manager.checkArrival(0, 0, at(30))).toBe(false);
      expect(manager.getStatus().phase).toBe("pre_departure");
      expect(manager.getStatus().lastArrivalCheckAt).toEqual(at(30));
    });
  });

  describe("manual control", () => {
    test("should report no change when already in the requested phase", () => {
      expect(manager.transitionPhase("pre_departure")).toBe(false);
      expect(spies.log).not.toHaveBeenCalled();
    });

    test("should clear departure and arrival when moved back before departure", () => {
      manager.triggerDeparture(at(0));
      manager.triggerArrival(at(60));
      expect(manager.transitionPhase("pre_departure", "plan amended")).toBe(true);

      const status = manager.getStatus();
      expect(status.departureTime).toBeNull();
      expect(status.arrivalTime).toBeNull();
      expect(spies.log).toHaveBeenLastCalledWith("[FLIGHT STATE] post_arrival → pre_departure (plan amended)");
    });

    test("should clear arrival when resuming flight", () => {
      manager.triggerDeparture(at(0));
      manager.triggerArrival(at(60));
      manager.transitionPhase("in_flight");
      expect(manager.getStatus().arrivalTime).toBeNull();
      expect(manager.getStatus().departureTime).toEqual(at(0));
    });

    test("should reset times and check stamps", () => {
      manager.checkDeparture(60, at(0));
      manager.triggerDeparture(at(1));
      manager.reset();

      const status = manager.getStatus();
      expect(status.phase).toBe("pre_departure");
      expect(status.departureTime).toBeNull();
      expect(status.lastDepartureCheckAt).toBeNull();
    });

    test("should count time since departure against the clock", () => {
      manager.triggerDeparture(at(0, 10));
      clock.set(at(1));
      expect(manager.getStatus().timeSinceDepartureSeconds).toBe(50);
      expect(manager.getStatus().timeUntilDepartureSeconds).toBeNull();
    });
  });

  describe("route context", () => {
    const scheduled = () =>
      eastboundRoute({ timingProfile: { departureTime: at(30), arrivalTime: at(150) } });

    test("should expose the active route and its schedule", () => {
      manager.updateRouteContext(scheduled());
      const status = manager.getStatus();

      expect(status.activeRouteId).toBe("route-1");
      expect(status.activeRouteName).toBe("Test Route");
      expect(status.hasTimingData).toBe(true);
      expect(status.scheduledDepartureTime).toEqual(at(30));
      expect(status.scheduledArrivalTime).toEqual(at(150));
      expect(status.timeUntilDepartureSeconds).toBe(1800);
    });

    test("should keep the flight when the same route is pushed again", () => {
      manager.updateRouteContext(scheduled());
      manager.triggerDeparture(at(0));
      manager.updateRouteContext(scheduled());
      expect(manager.getStatus().phase).toBe("in_flight");
    });

    test("should reset the flight when the route changes", () => {
      manager.updateRouteContext(scheduled());
      manager.triggerDeparture(at(0));
      manager.updateRouteContext(eastboundRoute({ id: "route-2", name: "" }));

      const status = manager.getStatus();
      expect(status.phase).toBe("pre_departure");
      expect(status.departureTime).toBeNull();
      expect(status.activeRouteName).toBe("route-2");
      expect(spies.log).toHaveBeenLastCalledWith(
        "[FLIGHT STATE] in_flight → pre_departure (active route changed)",
      );
    });

    test("should keep the phase when auto reset is disabled", () => {
      manager.triggerDeparture(at(0));
      manager.updateRouteContext(scheduled(), false);
      expect(manager.getStatus().phase).toBe("in_flight");
      expect(manager.getStatus().activeRouteId).toBe("route-1");
    });

    test("should clear the route without touching phase", () => {
      manager.updateRouteContext(scheduled());
      manager.triggerDeparture(at(0));
      manager.clearRouteContext();

      const status = manager.getStatus();
      expect(status.phase).toBe("in_flight");
      expect(status.activeRouteId).toBeNull();
      expect(status.scheduledDepartureTime).toBeNull();
      expect(status.hasTimingData).toBe(false);
    });
  });

  describe("listeners", () => {
    test("should notify phase and ETA mode changes", () => {
      const phases: PhaseChange[] = [];
      const modes: ETAModeChange[] = [];
      manager.onPhaseChange((change) => phases.push(change));
      manager.onEtaModeChange((change) => modes.push(change));

      manager.triggerDeparture(at(0));
      manager.triggerArrival(at(60));

      expect(phases).toEqual([
        { previous: "pre_departure", current: "in_flight", reason: "manual departure", at: at(0) },
        { previous: "in_flight", current: "post_arrival", reason: "manual arrival", at: at(60) },
      ]);
      expect(modes).toEqual([{ previous: "anticipated", current: "estimated", at: at(0) }]);
    });

    test("should stop notifying after unsubscribe", () => {
      const listener = jest.fn();
      const unsubscribe = manager.onPhaseChange(listener);
      unsubscribe();
      manager.triggerDeparture(at(0));
      expect(listener).not.toHaveBeenCalled();
    });

    test("should notify after the state is settled", () => {
      const seen: string[] = [];
      manager.onPhaseChange(() => {
        seen.push(manager.getStatus().phase);
        if (manager.getStatus().phase === "in_flight") {
          manager.triggerArrival(at(5), "landed from listener");
        }
      });

      manager.triggerDeparture(at(0));
      expect(seen).toEqual(["in_flight", "post_arrival"]);
      expect(manager.getStatus().arrivalTime).toEqual(at(5));
    });

    test("should isolate a failing listener", () => {
      const failure = new Error("listener broke");
      const after = jest.fn();
      manager.onPhaseChange(() => {
        throw failure;
      });
      manager.onPhaseChange(after);

      expect(manager.triggerDeparture(at(0))).toBe(true);
      expect(after).toHaveBeenCalledTimes(1);
      expect(spies.error).toHaveBeenCalledWith("[FLIGHT STATE] Listener failed:", failure);
    });
  });
});
