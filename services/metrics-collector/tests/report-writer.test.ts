// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@usage-metrics/collector/tests/report-writer.test`
 * Purpose: Unit tests for the JSON report document and dated default file names.
 * @internal
 */

import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { FakeClock } from "@tests/_fakes/fake-clock";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  buildReportPayload,
  defaultChartPath,
  defaultReportPath,
  runDate,
  serializeReport,
  writeReport,
} from "../src/output/report-writer";

describe("dated output names", () => {
  it("uses the UTC date of the clock", () => {
    const clock = new FakeClock("2024-03-09T23:30:00.000-05:00");

    expect(runDate(clock)).toBe("2024-03-10");
    expect(defaultReportPath(clock)).toBe("metrics-2024-03-10.json");
    expect(defaultChartPath(clock)).toBe("pr-summary-2024-03-10.svg");
  });
});

describe("serializeReport", () => {
  it("writes the manifest and shards with 2-space indent and a trailing newline", () => {
    const payload = buildReportPayload(
      { download_links: ["https://reports.example.test/a.json"] },
      [{ day_totals: [] }]
    );

    expect(serializeReport(payload)).toBe(
      [
        "{",
        '  "report_links": {',
        '    "download_links": [',
        '      "https://reports.example.test/a.json"',
        "    ]",
        "  },",
        '  "reports": [',
        "    {",
        '      "day_totals": []',
        "    }",
        "  ]",
        "}",
        "",
      ].join("\n")
    );
  });
});

describe("writeReport", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "usage-metrics-report-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("creates parent directories and round-trips the document", async () => {
    const outputPath = path.join(dir, "out", "metrics.json");
    const payload = buildReportPayload({ download_links: [] }, []);

    await writeReport(outputPath, payload);

    expect(JSON.parse(await readFile(outputPath, "utf-8"))).toEqual({
      report_links: { download_links: [] },
      reports: [],
    });
  });
});
