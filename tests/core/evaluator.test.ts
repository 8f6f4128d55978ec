import { describe, expect, test } from "vitest";
import {
  evaluateItem,
  evaluateSnapshot,
  projectRatio,
  SECONDS_PER_DAY,
  SECONDS_PER_YEAR,
} from "../../src/core/retention/evaluator";
import type { RetentionPolicy, TorrentItem } from "../../src/types";

const NOW = 1_700_000_000;
const DAY = SECONDS_PER_DAY;

function torrent(overrides: Partial<TorrentItem> = {}): TorrentItem {
  return { hash: "abc123", name: "Test torrent", ...overrides };
}

function policy(overrides: Partial<RetentionPolicy> = {}): RetentionPolicy {
  return { ageThresholdDays: 100, ratioThreshold: 10, simulate: false, ...overrides };
}

describe("projectRatio", () => {
  test("leaves a one-year-old ratio unchanged", () => {
    expect(projectRatio(2.5, SECONDS_PER_YEAR)).toBe(2.5);
  });

  test("scales a half-year ratio by two", () => {
    expect(projectRatio(1, SECONDS_PER_YEAR / 2)).toBe(2);
  });
});

describe("evaluateItem", () => {
  describe("documented scenarios", () => {
    test("removes a 200 day old torrent projected below the target", () => {
      const decision = evaluateItem(
        torrent({ addedOn: NOW - 200 * DAY, ratio: 1 }),
        policy({ ratioThreshold: 2 }),
        NOW,
      );

      expect(decision.action).toBe("remove");
      expect(decision.ageDays).toBe(200);
      expect(decision.projectedRatio).toBeCloseTo(1.825, 10);
    });

    test("keeps the same torrent when the target is 1.0", () => {
      const decision = evaluateItem(
        torrent({ addedOn: NOW - 200 * DAY, ratio: 1 }),
        policy({ ratioThreshold: 1 }),
        NOW,
      );

      expect(decision.action).toBe("keep");
      expect(decision.projectedRatio).toBeCloseTo(1.825, 10);
    });

    test("marks a 50 day old torrent too young whatever its ratio", () => {
      for (const ratio of [0, 0.01, 100, undefined]) {
        const decision = evaluateItem(torrent({ addedOn: NOW - 50 * DAY, ratio }), policy(), NOW);

        expect(decision.action).toBe("too_young");
        expect(decision.projectedRatio).toBeUndefined();
        expect(decision.rationale).toBe("age 50d is within the 100d minimum age");
      }
    });

    test("keeps an old torrent without a ratio", () => {
      const decision = evaluateItem(torrent({ addedOn: NOW - 365 * DAY }), policy(), NOW);

      expect(decision.action).toBe("keep");
      expect(decision.projectedRatio).toBeUndefined();
      expect(decision.rationale).toBe("no ratio reported yet, nothing to project");
    });
  });

  describe("age floor", () => {
    test("an age exactly at the threshold is still too young", () => {
      const decision = evaluateItem(
        torrent({ addedOn: NOW - 100 * DAY, ratio: 0 }),
        policy(),
        NOW,
      );

      expect(decision.ageSeconds).toBe(100 * DAY);
      expect(decision.action).toBe("too_young");
    });

    test("one second past the threshold is evaluated", () => {
      const decision = evaluateItem(
        torrent({ addedOn: NOW - 100 * DAY - 1, ratio: 0 }),
        policy(),
        NOW,
      );

      expect(decision.action).toBe("remove");
      expect(decision.projectedRatio).toBe(0);
    });

    test("a missing added time counts as the epoch", () => {
      const decision = evaluateItem(torrent({ ratio: 1000 }), policy(), NOW);

      expect(decision.ageSeconds).toBe(NOW);
      expect(decision.action).toBe("keep");
    });
  });

  describe("zero age", () => {
    test("a torrent added in the future has age 0", () => {
      const decision = evaluateItem(
        torrent({ addedOn: NOW + 3600, ratio: 1 }),
        policy({ ageThresholdDays: 0 }),
        NOW,
      );

      expect(decision.ageSeconds).toBe(0);
      expect(decision.ageDays).toBe(0);
      expect(decision.action).toBe("too_young");
    });

    test("age 0 with a 0 day threshold never reaches the projection", () => {
      const decision = evaluateItem(
        torrent({ addedOn: NOW, ratio: 1 }),
        policy({ ageThresholdDays: 0 }),
        NOW,
      );

      expect(decision.action).toBe("too_young");
      expect(decision.projectedRatio).toBeUndefined();
    });

    test("the smallest projectable age is one second", () => {
      const decision = evaluateItem(
        torrent({ addedOn: NOW - 1, ratio: 1 }),
        policy({ ageThresholdDays: 0 }),
        NOW,
      );

      expect(decision.action).toBe("keep");
      expect(decision.projectedRatio).toBe(SECONDS_PER_YEAR);
    });
  });

  test("clamps a negative ratio to zero", () => {
    const decision = evaluateItem(
      torrent({ addedOn: NOW - 200 * DAY, ratio: -1 }),
      policy({ ratioThreshold: 0 }),
      NOW,
    );

    expect(decision.projectedRatio).toBe(0);
    expect(decision.action).toBe("keep");
  });

  test("describes a removal with the projection and target", () => {
    const decision = evaluateItem(
      torrent({ addedOn: NOW - 365 * DAY, ratio: 1 }),
      policy({ ratioThreshold: 2 }),
      NOW,
    );

    expect(decision.rationale).toBe("projected ratio 1.00 is below 2");
  });

  test("raising the target never turns a removal into a keep", () => {
    const item = torrent({ addedOn: NOW - 150 * DAY, ratio: 3 });
    const thresholds = [0, 1, 5, 7, 7.3, 7.4, 8, 20];
    const actions = thresholds.map((ratioThreshold) =>
      evaluateItem(item, policy({ ratioThreshold }), NOW).action,
    );

    const firstRemove = actions.indexOf("remove");
    expect(firstRemove).toBeGreaterThan(0);
    expect(actions.slice(0, firstRemove).every((a) => a === "keep")).toBe(true);
    expect(actions.slice(firstRemove).every((a) => a === "remove")).toBe(true);
  });

  test("does not modify the input torrent", () => {
    const item = torrent({ addedOn: NOW - 200 * DAY, ratio: -2 });
    const copy = { ...item };

    evaluateItem(item, policy(), NOW);

    expect(item).toEqual(copy);
  });
});

describe("evaluateSnapshot", () => {
  test("evaluates every torrent against the same reference time, in order", () => {
    const items = [
      torrent({ hash: "a", addedOn: NOW - 10 * DAY, ratio: 1 }),
      torrent({ hash: "b", addedOn: NOW - 365 * DAY, ratio: 1 }),
      torrent({ hash: "c", addedOn: NOW - 365 * DAY, ratio: 20 }),
    ];

    const decisions = evaluateSnapshot(items, policy(), NOW);

    expect(decisions.map((d) => d.item.hash)).toEqual(["a", "b", "c"]);
    expect(decisions.map((d) => d.action)).toEqual(["too_young", "remove", "keep"]);
    expect(decisions.map((d) => d.ageDays)).toEqual([10, 365, 365]);
  });

  test("returns nothing for an empty snapshot", () => {
    expect(evaluateSnapshot([], policy(), NOW)).toEqual([]);
  });
});
