import { projectPOIOntoRoute } from "../../route/projection";
import {
  anticipatedRouteETA,
  estimatedRouteETA,
  findWaypointForPOI,
} from "../route-eta";
import { at, eastboundRoute, poi, route } from "../../__tests__/fixtures";

/** Three points along the equator, 1° apart, with planned leg speeds. */
function equatorRoute() {
  return route({
    points: [
      { latitude: 0, longitude: 0, sequence: 0, expectedArrivalTime: at(0), expectedSegmentSpeedKnots: 200 },
      { latitude: 0, longitude: 1, sequence: 1, expectedSegmentSpeedKnots: 240 },
      { latitude: 0, longitude: 2, sequence: 2 },
    ],
    waypoints: [
      { name: "Start", latitude: 0, longitude: 0, order: 0 },
      { name: "Target", latitude: 0, longitude: 2, order: 1 },
    ],
  });
}

describe("findWaypointForPOI", () => {
  test("should match waypoint names case-insensitively", () => {
    expect(findWaypointForPOI(equatorRoute(), poi({ name: "TARGET", latitude: 0, longitude: 2 }))?.name).toBe(
      "Target",
    );
    expect(findWaypointForPOI(equatorRoute(), poi({ name: "Elsewhere", latitude: 0, longitude: 2 }))).toBeUndefined();
  });
});

describe("anticipatedRouteETA", () => {
  test("should use the planned arrival at the matching waypoint", () => {
    const timed = eastboundRoute({
      waypoints: [{ name: "Target", latitude: 40, longitude: -25, order: 0, expectedArrivalTime: at(90) }],
    });
    expect(anticipatedRouteETA(timed, poi({ latitude: 40, longitude: -25 }), at(0))).toEqual({
      kind: "estimate",
      seconds: 5400,
    });
  });

  test("should place an untimed waypoint by projecting it onto the route", () => {
    const timed = eastboundRoute({
      waypoints: [{ name: "Target", latitude: 40, longitude: -35, order: 0 }],
    });
    expect(anticipatedRouteETA(timed, poi({ latitude: 40, longitude: -35 }), at(10))).toEqual({
      kind: "estimate",
      seconds: 1200,
    });
  });

  test("should use a precomputed POI projection", () => {
    const timed = eastboundRoute();
    const projected = projectPOIOntoRoute(poi({ latitude: 40, longitude: -35 }), timed);
    expect(anticipatedRouteETA(timed, projected, at(0))).toEqual({ kind: "estimate", seconds: 1800 });
  });

  test("should report a planned time in the past as elapsed", () => {
    const timed = eastboundRoute();
    const projected = projectPOIOntoRoute(poi({ latitude: 40, longitude: -35 }), timed);
    expect(anticipatedRouteETA(timed, projected, at(45))).toEqual({ kind: "elapsed" });
  });

  test("should be unavailable without planned times", () => {
    const untimed = route({
      points: [
        { latitude: 0, longitude: 0, sequence: 0 },
        { latitude: 0, longitude: 1, sequence: 1 },
      ],
    });
    expect(anticipatedRouteETA(untimed, poi({ latitude: 0, longitude: 1 }), at(0))).toEqual({
      kind: "unavailable",
      reason: "route has no planned times",
    });
  });

  test("should be unavailable for a POI that is not on the route", () => {
    expect(anticipatedRouteETA(eastboundRoute(), poi({ latitude: 10, longitude: 10 }), at(0))).toEqual({
      kind: "unavailable",
      reason: "POI is not on the route",
    });
  });
});

describe("estimatedRouteETA", () => {
  test("should walk the route to a waypoint, blending live and planned speed on the first leg", () => {
    const result = estimatedRouteETA(equatorRoute(), poi({ latitude: 0, longitude: 2 }), 0, 0.1, 120);

    expect(result.kind).toBe("estimate");
    if (result.kind !== "estimate") return;
    // 0.9° at (120 + 200) / 2 kn, then 1° at the planned 240 kn.
    expect(result.seconds).toBeCloseTo(2116.426115, 5);
  });

  test("should stop at the projection of an off-route POI", () => {
    const target = projectPOIOntoRoute(poi({ name: "Offset", latitude: 0.005, longitude: 1.5 }), equatorRoute());
    const result = estimatedRouteETA(equatorRoute(), target, 0, 0.1, 120);

    expect(result.kind).toBe("estimate");
    if (result.kind !== "estimate") return;
    // 0.9° at 160 kn, then 0.5° at 240 kn.
    expect(result.seconds).toBeCloseTo(1666.122686, 5);
  });

  test("should report a waypoint behind the aircraft as elapsed", () => {
    const result = estimatedRouteETA(
      equatorRoute(),
      poi({ name: "Start", latitude: 0, longitude: 0 }),
      0,
      1.9,
      120,
    );
    expect(result).toEqual({ kind: "elapsed" });
  });

  test("should be unavailable when the projection is not ahead within tolerance", () => {
    const target = projectPOIOntoRoute(poi({ name: "Offset", latitude: 0.005, longitude: 1.5 }), equatorRoute());
    expect(estimatedRouteETA(equatorRoute(), target, 0, 0.1, 120, 0)).toEqual({
      kind: "unavailable",
      reason: "POI projection is not ahead on the route",
    });
  });

  test("should be unavailable for a POI without a route position", () => {
    expect(estimatedRouteETA(equatorRoute(), poi({ name: "Loose", latitude: 5, longitude: 5 }), 0, 0, 120)).toEqual({
      kind: "unavailable",
      reason: "POI has no route position",
    });
  });

  test("should be unavailable for a route without timing data", () => {
    const untimed = route({
      points: [
        { latitude: 0, longitude: 0, sequence: 0 },
        { latitude: 0, longitude: 1, sequence: 1 },
      ],
    });
    expect(estimatedRouteETA(untimed, poi({ latitude: 0, longitude: 1 }), 0, 0, 120)).toEqual({
      kind: "unavailable",
      reason: "route has no timing data",
    });
  });

  test("should skip legs flown at a standstill", () => {
    const slow = route({
      points: [
        { latitude: 0, longitude: 0, sequence: 0, expectedArrivalTime: at(0) },
        { latitude: 0, longitude: 1, sequence: 1 },
      ],
      waypoints: [{ name: "Target", latitude: 0, longitude: 1, order: 0 }],
    });
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined);

    expect(estimatedRouteETA(slow, poi({ latitude: 0, longitude: 1 }), 0, 0.5, 0.4)).toEqual({
      kind: "unavailable",
      reason: "no travel time along route",
    });
    expect(warn).toHaveBeenCalledWith(
      "[ETA] Skipping leg 1 toward Target: 0.4 kn is at or below the 0.5 kn minimum",
    );
    warn.mockRestore();
  });
});
