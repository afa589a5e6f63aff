import { describe, it, expect, vi } from "vitest";

import { InvalidArgument } from "../../src/errors.js";
import {
  ExportCoordinator,
  runExport,
} from "../../src/export/ExportCoordinator.js";
import type {
  ExportRequest,
  HostExportOutcome,
  OutfitHost,
  RejectedDescriptor,
  SkeletonGroup,
} from "../../src/types.js";
import { femaleGroup, group } from "../helpers.js";

/**
 * In-memory host that records every request and can be told to fail
 */
class FakeHost implements OutfitHost {
  readonly requests: ExportRequest[] = [];

  constructor(
    private readonly decide: (
      request: ExportRequest,
      call: number,
    ) => HostExportOutcome = (request) => ({
      ok: true,
      path: `${request.exportDir}/${request.fileName}`,
    }),
  ) {}

  async exportCombination(request: ExportRequest): Promise<HostExportOutcome> {
    this.requests.push(request);
    return this.decide(request, this.requests.length);
  }
}

function groups(...list: SkeletonGroup[]): Map<string, SkeletonGroup> {
  return new Map(list.map((g) => [g.skeleton, g]));
}

describe("ExportCoordinator", () => {
  it("exports the whole product when fewer combinations exist than requested", async () => {
    const host = new FakeHost();
    const report = await runExport(groups(femaleGroup()), host, {
      combinations: 10,
      exportDir: "/out",
    });

    expect(host.requests).toHaveLength(4);
    expect(report.exported).toHaveLength(4);
    expect(report.failed).toEqual([]);
    expect(report.truncated).toEqual([
      { skeleton: "f", requested: 10, available: 4 },
    ]);
    expect(new Set(report.exported.map((e) => e.name)).size).toBe(4);
    for (const exported of report.exported) {
      expect(exported.path).toBe(`/out/${exported.name}.glb`);
      expect(exported.skeleton).toBe("f");
    }
  });

  it("sends part references and the file name to the host", async () => {
    const host = new FakeHost();
    await runExport(groups(femaleGroup()), host, {
      combinations: 10,
      exportDir: "/out",
      extension: "gltf",
    });

    const [first] = host.requests;
    expect(first.exportDir).toBe("/out");
    expect(first.fileName).toBe(`${first.name}.gltf`);
    expect(first.parts).toEqual([
      {
        category: "body",
        name: "skin-f-generic-01-v1-body",
        source: "/assets/body/skin-f-generic-01-v1-body.glb",
      },
      {
        category: "bottom",
        name: "outfit-f-casual-01-v1-bottom",
        source: "/assets/bottom/outfit-f-casual-01-v1-bottom.glb",
      },
      {
        category: "top",
        name: "outfit-f-casual-01-v1-top",
        source: "/assets/top/outfit-f-casual-01-v1-top.glb",
      },
    ]);
  });

  it("records a failed export against its combination and carries on", async () => {
    const host = new FakeHost((request, call) =>
      call === 2
        ? { ok: false, reason: "missing referenced asset" }
        : { ok: true, path: `/out/${request.fileName}` },
    );
    const report = await runExport(groups(femaleGroup()), host, {
      combinations: 10,
      exportDir: "/out",
    });

    expect(report.exported).toHaveLength(3);
    expect(report.failed).toEqual([
      {
        name: host.requests[1].name,
        skeleton: "f",
        reason: "missing referenced asset",
      },
    ]);
    expect(report.exported.map((e) => e.name)).not.toContain(
      host.requests[1].name,
    );
  });

  it("treats a throwing host as a failed export", async () => {
    const host = new FakeHost((request, call) => {
      if (call === 1) throw new Error("disk full");
      return { ok: true, path: `/out/${request.fileName}` };
    });
    const report = await runExport(groups(femaleGroup()), host, {
      combinations: 10,
      exportDir: "/out",
    });

    expect(report.failed).toHaveLength(1);
    expect(report.failed[0].reason).toBe("disk full");
    expect(report.exported).toHaveLength(3);
  });

  it("skips a group without body parts and exports the others", async () => {
    const host = new FakeHost();
    const headless = group("m", { top: ["outfit-m-casual-01-v1-top"] });
    const report = await runExport(groups(headless, femaleGroup()), host, {
      combinations: 2,
      exportDir: "/out",
      seed: 5,
    });

    expect(report.skipped).toEqual([{ skeleton: "m", reason: "no body parts" }]);
    expect(report.exported).toHaveLength(2);
    expect(report.truncated).toEqual([]);
  });

  it("rejects a negative count before touching the host", async () => {
    const host = new FakeHost();
    await expect(
      runExport(groups(femaleGroup()), host, {
        combinations: -1,
        exportDir: "/out",
      }),
    ).rejects.toBeInstanceOf(InvalidArgument);
    expect(host.requests).toEqual([]);
  });

  it("exports nothing for a count of zero", async () => {
    const host = new FakeHost();
    const report = await runExport(groups(femaleGroup()), host, {
      combinations: 0,
      exportDir: "/out",
    });
    expect(report.exported).toEqual([]);
    expect(host.requests).toEqual([]);
  });

  it("never exports the same name twice in one run", async () => {
    const host = new FakeHost();
    const shared = femaleGroup();
    const report = await runExport(
      new Map([
        ["f", shared],
        ["g", shared],
      ]),
      host,
      { combinations: 10, exportDir: "/out" },
    );

    expect(report.exported).toHaveLength(4);
    expect(report.duplicates).toBe(4);
    expect(host.requests).toHaveLength(4);
  });

  it("carries rejected inputs into the report", async () => {
    const rejected: RejectedDescriptor[] = [
      {
        identifier: "fullbody",
        category: "body",
        source: "/in/body/fullbody.glb",
        reason: "unparseable",
        message: 'Cannot parse "fullbody": identifier has no "-" separator',
      },
    ];
    const report = await runExport(groups(femaleGroup()), new FakeHost(), {
      combinations: 1,
      exportDir: "/out",
      seed: 1,
      rejected,
    });

    expect(report.rejected).toEqual(rejected);
    expect(report.rejected).not.toBe(rejected);
  });

  it("repeats a seeded run exactly", async () => {
    const wide = group("f", {
      body: ["skin-f-a-01", "skin-f-a-02", "skin-f-a-03"],
      top: ["outfit-f-a-01", "outfit-f-a-02", "outfit-f-a-03"],
      bottom: ["outfit-f-b-01", "outfit-f-b-02"],
    });
    const options = { combinations: 5, exportDir: "/out", seed: 21 };

    const first = await runExport(groups(wide), new FakeHost(), options);
    const second = await runExport(groups(wide), new FakeHost(), options);

    expect(first.exported).toHaveLength(5);
    expect(second.exported).toEqual(first.exported);
  });

  it("emits progress events", async () => {
    const host = new FakeHost((request, call) =>
      call === 4
        ? { ok: false, reason: "write error" }
        : { ok: true, path: `/out/${request.fileName}` },
    );
    const coordinator = new ExportCoordinator(host);
    const onStart = vi.fn();
    const onExported = vi.fn();
    const onFailed = vi.fn();
    const onComplete = vi.fn();
    coordinator.on("group:start", onStart);
    coordinator.on("combination:exported", onExported);
    coordinator.on("combination:failed", onFailed);
    coordinator.on("complete", onComplete);

    const report = await coordinator.run(groups(femaleGroup()), {
      combinations: 10,
      exportDir: "/out",
    });

    expect(onStart).toHaveBeenCalledWith("f", 4);
    expect(onExported).toHaveBeenCalledTimes(3);
    expect(onFailed).toHaveBeenCalledTimes(1);
    expect(onFailed.mock.calls[0][1].reason).toBe("write error");
    expect(onComplete).toHaveBeenCalledWith(report);
  });
});
