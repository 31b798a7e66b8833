import { ConfigurationError, TimelineComputationError } from "../../errors";
import { CoverageSampler } from "../../satellites/coverage";
import { SatelliteCatalog } from "../../satellites/catalog";
import {
  buildMissionTimeline,
  createLongitudeResolver,
  type BuildMissionTimelineOptions,
} from "../builder";
import {
  at,
  eastboundRoute,
  mission,
  poi,
  route,
  silenceConsole,
} from "../../__tests__/fixtures";

// Both X satellites sit at 30°W: abeam to the right of the eastbound leg, so
// the azimuth sweep stays clear for the whole flight.
function catalog(): SatelliteCatalog {
  return new SatelliteCatalog([
    { id: "X-1", transport: "X", longitude: -30, slot: null },
    { id: "X-2", transport: "X", longitude: -30, slot: null },
    { id: "AOR", transport: "Ka", longitude: -30, slot: null },
  ]);
}

function options(overrides: BuildMissionTimelineOptions = {}): BuildMissionTimelineOptions {
  return {
    coverageSampler: null,
    catalog: catalog(),
    now: () => at(-60),
    ...overrides,
  };
}

describe("buildMissionTimeline", () => {
  let spies: ReturnType<typeof silenceConsole>;

  beforeEach(() => {
    spies = silenceConsole();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test("should build three nominal segments for a clear two-hour flight", () => {
    const { timeline, summary } = buildMissionTimeline(mission(), eastboundRoute(), options());

    expect(
      timeline.segments.map((segment) => ({
        from: segment.start.toISOString(),
        to: segment.end.toISOString(),
        status: segment.status,
        reasons: segment.reasons,
      })),
    ).toEqual([
      {
        from: at(0).toISOString(),
        to: at(15).toISOString(),
        status: "nominal",
        reasons: ["Safety-of-Flight (takeoff)"],
      },
      { from: at(15).toISOString(), to: at(105).toISOString(), status: "nominal", reasons: [] },
      {
        from: at(105).toISOString(),
        to: at(120).toISOString(),
        status: "nominal",
        reasons: ["Safety-of-Flight (landing)"],
      },
    ]);
    expect(timeline.missionId).toBe("mission-1");
    expect(timeline.createdAt).toEqual(at(-60));
    expect(timeline.advisories).toEqual([]);
    expect(timeline.statistics.nextConflictSeconds).toBe(-1);

    expect(summary.segmentCount).toBe(3);
    expect(summary.sampleCount).toBe(121);
    expect(summary.sampleIntervalSeconds).toBe(60);
    expect(summary.transportStates).toEqual({ X: "available", Ka: "available", Ku: "available" });
    expect(summary.generationRuntimeMs).toBeGreaterThanOrEqual(0);
    expect(spies.log).toHaveBeenCalledWith(
      expect.stringMatching(/^\[TIMELINE\] Built mission-1: 3 segments from 12 events in \d+ms$/),
    );
  });

  test("should honour the sample interval", () => {
    const { summary } = buildMissionTimeline(
      mission(),
      eastboundRoute(),
      options({ sampleIntervalSeconds: 600 }),
    );
    expect(summary.sampleCount).toBe(13);
    expect(summary.sampleIntervalSeconds).toBe(600);
  });

  test("should degrade X around a transition and advise the crew", () => {
    const { timeline } = buildMissionTimeline(
      mission({
        xTransitions: [{ id: "xt-1", latitude: 40, longitude: -30, targetSatelliteId: "X-2" }],
      }),
      eastboundRoute(),
      options(),
    );

    expect(timeline.segments.map((segment) => segment.status)).toEqual([
      "nominal",
      "nominal",
      "degraded",
      "nominal",
      "nominal",
    ]);
    expect(timeline.segments[2].start).toEqual(at(45));
    expect(timeline.segments[2].end).toEqual(at(75));
    expect(timeline.segments[2].reasons).toEqual(["X Transition to X-2"]);
    expect(timeline.advisories.map((advisory) => advisory.message)).toEqual([
      "Disable X from 10:45Z to 11:15Z during transition to X-2",
    ]);
    expect(timeline.statistics.degradedSeconds).toBe(1800);
    expect(timeline.statistics.nextConflictSeconds).toBe(2700);
  });

  test("should take Ku offline for a manual outage and skip outages outside the window", () => {
    const { timeline } = buildMissionTimeline(
      mission({
        kuOutages: [
          { id: "ku-1", startTime: at(30).toISOString(), durationSeconds: 600, reason: "Planned maintenance" },
          { id: "ku-late", startTime: at(200).toISOString(), durationSeconds: 60 },
        ],
      }),
      eastboundRoute(),
      options(),
    );

    const outage = timeline.segments.find((segment) => segment.states.Ku === "offline");
    expect(outage?.start).toEqual(at(30));
    expect(outage?.end).toEqual(at(40));
    expect(outage?.status).toBe("degraded");
    expect(outage?.reasons).toEqual(["Planned maintenance"]);
    expect(spies.warn).toHaveBeenCalledWith(
      "[TIMELINE] Ku outage ku-late falls outside the mission window",
    );
  });

  test("should report a Ka coverage gap when the route leaves the footprint", () => {
    // AOR covers the route up to 30.95°W, reached just after minute 54.
    const sampler = new CoverageSampler(
      new Map([
        [
          "AOR",
          [
            [
              [-45, 35],
              [-30.95, 35],
              [-30.95, 45],
              [-45, 45],
            ] as const,
          ],
        ],
      ]),
    );
    const { timeline } = buildMissionTimeline(
      mission(),
      eastboundRoute(),
      options({ coverageSampler: sampler }),
    );

    expect(timeline.segments.map((segment) => segment.status)).toEqual([
      "nominal",
      "nominal",
      "degraded",
      "degraded",
    ]);
    expect(Math.abs(timeline.segments[2].start.getTime() - at(54.5).getTime())).toBeLessThan(5);
    expect(timeline.segments[2].reasons).toEqual(["Ka coverage lost (AOR)"]);
    expect(timeline.segments[3].reasons).toEqual([
      "Safety-of-Flight (landing)",
      "Ka coverage lost (AOR)",
    ]);
  });

  test("should ignore footprints of satellites outside the mission's Ka list", () => {
    const sampler = new CoverageSampler(
      new Map([["AOR", [[[-45, 35], [-15, 35], [-15, 45], [-45, 45]] as const]]]),
    );
    const { timeline } = buildMissionTimeline(
      mission({ initialKaSatelliteIds: ["POR"] }),
      eastboundRoute(),
      options({ coverageSampler: sampler }),
    );

    expect(timeline.segments.map((segment) => segment.status)).toEqual([
      "degraded",
      "degraded",
      "degraded",
    ]);
    expect(timeline.segments[1].reasons).toEqual(["Ka coverage unavailable"]);
  });

  test("should skip coverage analysis for an empty sampler", () => {
    const { timeline } = buildMissionTimeline(
      mission(),
      eastboundRoute(),
      options({ coverageSampler: new CoverageSampler(new Map()) }),
    );
    expect(timeline.segments).toHaveLength(3);
  });

  test("should resolve refueling windows from waypoint times and route projection", () => {
    const { timeline } = buildMissionTimeline(
      mission({
        refuelingWindows: [
          { id: "aar-1", startWaypointName: "arip", endWaypointName: "ARCP" },
          { id: "aar-2", startWaypointName: "ARIP", endWaypointName: "NOWHERE" },
        ],
      }),
      eastboundRoute({
        waypoints: [
          { name: "ARIP", latitude: 40, longitude: -35, order: 0 },
          { name: "ARCP", latitude: 40, longitude: -25, order: 1, expectedArrivalTime: at(90) },
        ],
      }),
      options(),
    );

    expect(timeline.statistics.refuelingBlocks).toEqual([{ id: "aar-1", start: at(30), end: at(90) }]);
    expect(timeline.segments).toHaveLength(3);
    expect(spies.warn).toHaveBeenCalledWith(
      "[TIMELINE] Refueling window aar-2: waypoint NOWHERE not found",
    );
  });

  test("should fall back to POI longitudes for satellites missing from the catalog", () => {
    const poiSource = {
      findGlobalPoiByName: (name: string) =>
        name === "X-1" ? poi({ name: "X-1", latitude: 0, longitude: -30 }) : null,
    };
    const { timeline } = buildMissionTimeline(
      mission(),
      eastboundRoute(),
      options({ catalog: new SatelliteCatalog(), poiSource }),
    );

    expect(timeline.segments).toHaveLength(3);
    expect(spies.warn).not.toHaveBeenCalled();
  });

  test("should warn when the X satellite cannot be located", () => {
    buildMissionTimeline(mission(), eastboundRoute(), options({ catalog: new SatelliteCatalog() }));
    expect(spies.warn).toHaveBeenCalledWith(
      "[RULES] No longitude for X satellite X-1; skipping its samples",
    );
  });

  test("should warn when the mission names a different route", () => {
    buildMissionTimeline(mission(), eastboundRoute({ id: "route-2" }), options());
    expect(spies.warn).toHaveBeenCalledWith(
      "[TIMELINE] Mission mission-1 references route route-1, building against route-2",
    );
  });

  describe("failures", () => {
    test("should reject a route without an id", () => {
      expect(() => buildMissionTimeline(mission(), eastboundRoute({ id: " " }), options())).toThrow(
        new TimelineComputationError("Route has no id"),
      );
    });

    test("should reject a route without points", () => {
      expect(() => buildMissionTimeline(mission(), route({ points: [] }), options())).toThrow(
        "Route route-1 has no points",
      );
    });

    test("should pass configuration errors through unchanged", () => {
      const untimed = route({
        points: [
          { latitude: 0, longitude: 0, sequence: 0 },
          { latitude: 0, longitude: 1, sequence: 1 },
        ],
      });
      expect(() => buildMissionTimeline(mission(), untimed, options())).toThrow(ConfigurationError);
    });

    test("should accept a mission window for an untimed route", () => {
      const untimed = route({
        points: [
          { latitude: 0, longitude: 0, sequence: 0 },
          { latitude: 0, longitude: 1, sequence: 1 },
        ],
      });
      const { timeline } = buildMissionTimeline(
        mission(),
        untimed,
        options({ missionWindow: { start: at(0), end: at(60) } }),
      );
      expect(timeline.missionEnd).toEqual(at(60));
    });

    test("should wrap unexpected failures in TimelineComputationError", () => {
      const cause = new Error("lookup offline");
      const poiSource = {
        findGlobalPoiByName: (): null => {
          throw cause;
        },
      };

      let caught: unknown;
      try {
        buildMissionTimeline(
          mission(),
          eastboundRoute(),
          options({ catalog: new SatelliteCatalog(), poiSource }),
        );
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(TimelineComputationError);
      expect(caught).toMatchObject({
        code: "TIMELINE_COMPUTATION_ERROR",
        message: "Timeline build failed for mission mission-1: lookup offline",
        cause,
      });
      expect(spies.error).toHaveBeenCalledTimes(1);
    });
  });
});

describe("createLongitudeResolver", () => {
  test("should prefer the catalog over the POI source", () => {
    const resolve = createLongitudeResolver(catalog(), {
      findGlobalPoiByName: () => poi({ latitude: 0, longitude: 99 }),
    });
    expect(resolve("X-1")).toBe(-30);
    expect(resolve("X-9")).toBe(99);
  });

  test("should return null when nothing knows the satellite", () => {
    expect(createLongitudeResolver(catalog())("X-9")).toBeNull();
  });
});
