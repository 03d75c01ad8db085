import { describe, it, expect } from "vitest";
import { loadCatalog } from "@codeguard/core";
import { scanSource, scanUnit, scanUnits } from "../engine/scanner.js";
import { ScanUnitError } from "../engine/source.js";
import { matchUnit } from "../engine/matcher.js";
import type { SourceUnit } from "../engine/types.js";
import { catalog, config, defaultDocument, silentLogger, unit } from "./helpers.js";

const clientSource = [
  "import openstack",
  "import requests",
  "",
  "AUTH_URL = 'http://keystone.internal:5000/v3'",
  "",
  "def connect():",
  "    conn = openstack.connect(",
  "        auth_url=AUTH_URL,",
  "        username='admin',",
  "        password='super-secret-password',",
  "    )",
  "    return conn",
  "",
  "def list_servers(conn):",
  "    try:",
  "        return list(conn.compute.servers())",
  "    except Exception as e:",
  '        print(f"Failed to list servers: {e}")',
  "        return []",
].join("\n");

const units: SourceUnit[] = [
  { id: "src/client.py", content: clientSource },
  { id: "tests/test_client.py", content: 'password = "secret123"\nrequests.get(url, verify=False)' },
  { id: "src/clean.py", content: "def add(a, b):\n    return a + b\n" },
  { id: "docs/example.py", content: 'password = "secret123"' },
  { id: "assets/logo.bin", content: new Uint8Array([0xff, 0xfe, 0x00, 0x01]) },
];

describe("scanUnits", () => {
  it("produces a canonically ordered report", async () => {
    const report = await scanUnits(units, catalog, { logger: silentLogger, config: { concurrency: 2 } });
    expect(report.findings().map((f) => `${f.score} ${f.unit}:${f.line} ${f.indicatorId}`)).toEqual([
      "10 src/client.py:10 CRED001-A",
      "10 tests/test_client.py:2 SSL001-A",
      "8 src/client.py:4 SSL001-D",
      "8 tests/test_client.py:1 CRED001-A",
      "6 src/client.py:17 ERR001-A",
      "5 src/client.py:18 LOG001-C",
      "2 tests/test_client.py:2 ERR001-C",
    ]);
    expect(report.countBySeverityBand()).toEqual({ Critical: 2, High: 2, Medium: 2, Low: 1 });
    expect(report.countByCategory()).toEqual({
      HardcodedCredentials: 2,
      SSLVerificationDisabled: 2,
      InputValidationMissing: 0,
      InformationDisclosureInLogs: 1,
      InsufficientErrorHandling: 2,
    });
    expect(report.scannedUnits).toEqual([
      "docs/example.py",
      "src/clean.py",
      "src/client.py",
      "tests/test_client.py",
    ]);
    expect(report.skippedUnits).toEqual(["assets/logo.bin"]);
    expect(report.diagnostics).toEqual([
      { kind: "unit-skipped", unit: "assets/logo.bin", message: "assets/logo.bin is not valid UTF-8 text" },
    ]);
    expect(report.incomplete).toBe(false);
  });

  it("gives the same report for any worker count and input order", async () => {
    const one = await scanUnits(units, catalog, { logger: silentLogger, config: { concurrency: 1 } });
    const four = await scanUnits([...units].reverse(), catalog, {
      logger: silentLogger,
      config: { concurrency: 4 },
    });
    expect(JSON.stringify(four.toJSON())).toBe(JSON.stringify(one.toJSON()));
  });

  it("gives identical findings when scanning the same unit twice", async () => {
    const first = await scanSource("app.py", clientSource, catalog, { logger: silentLogger });
    const second = await scanSource("app.py", clientSource, catalog, { logger: silentLogger });
    expect(JSON.stringify(second.toJSON())).toBe(JSON.stringify(first.toJSON()));
  });

  it("returns an empty report for clean input", async () => {
    const report = await scanSource("clean.py", "def add(a, b):\n    return a + b\n", catalog, {
      logger: silentLogger,
    });
    expect(report.total).toBe(0);
    expect(report.countBySeverityBand()).toEqual({ Critical: 0, High: 0, Medium: 0, Low: 0 });
    expect(report.countByCategory()).toEqual({
      HardcodedCredentials: 0,
      SSLVerificationDisabled: 0,
      InputValidationMissing: 0,
      InformationDisclosureInLogs: 0,
      InsufficientErrorHandling: 0,
    });
    expect(report.diagnostics).toEqual([]);
  });

  it("accepts async iterables", async () => {
    async function* source(): AsyncGenerator<SourceUnit> {
      yield { id: "a.py", content: 'password = "secret123"' };
      yield { id: "b.py", content: "except:" };
    }
    const report = await scanUnits(source(), catalog, { logger: silentLogger, config: { concurrency: 3 } });
    expect(report.findings().map((f) => `${f.unit} ${f.score}`)).toEqual(["a.py 10", "b.py 3"]);
  });
});

describe("Canonical examples", () => {
  it("flags a hardcoded password at 7 or above", async () => {
    const report = await scanSource("app.py", 'password = "secret123"', catalog, { logger: silentLogger });
    const [f] = report.findings();
    expect(f.category).toBe("HardcodedCredentials");
    expect(f.score).toBeGreaterThanOrEqual(7);
  });

  it("flags verify=False at 9 or 10", async () => {
    const report = await scanSource("app.py", "requests.get(url, verify=False)", catalog, {
      logger: silentLogger,
    });
    const ssl = report.findings().find((f) => f.category === "SSLVerificationDisabled");
    expect(ssl?.score).toBe(10);
  });

  it("flags a bare except without re-raise between 1 and 6", async () => {
    const report = await scanSource("app.py", "except:\n    pass", catalog, { logger: silentLogger });
    const [f] = report.findings();
    expect(f.category).toBe("InsufficientErrorHandling");
    expect(f.score).toBe(3);
    expect(f.lowConfidence).toBe(true);
  });
});

describe("Cancellation", () => {
  it("reports only units finished before the abort", async () => {
    const controller = new AbortController();
    async function* source(): AsyncGenerator<SourceUnit> {
      yield { id: "a.py", content: 'password = "secret123"' };
      yield { id: "b.py", content: "requests.get(url, verify=False)" };
      controller.abort();
      yield { id: "c.py", content: "except:" };
    }

    const report = await scanUnits(source(), catalog, {
      logger: silentLogger,
      config: { concurrency: 1 },
      signal: controller.signal,
    });
    expect(report.incomplete).toBe(true);
    expect(report.scannedUnits).toEqual(["a.py", "b.py"]);
    expect(report.findings().map((f) => `${f.unit}:${f.indicatorId}`)).toEqual([
      "a.py:CRED001-A",
      "b.py:SSL001-A",
      "b.py:ERR001-C",
    ]);
    expect(report.diagnostics).toEqual([
      { kind: "scan-cancelled", message: "Scan cancelled before all units were processed" },
    ]);
  });

  it("returns an empty incomplete report when aborted up front", async () => {
    const controller = new AbortController();
    controller.abort();
    const report = await scanUnits(units, catalog, { logger: silentLogger, signal: controller.signal });
    expect(report.incomplete).toBe(true);
    expect(report.total).toBe(0);
    expect(report.scannedUnits).toEqual([]);
  });
});

describe("Source failures", () => {
  it("keeps finished units when the source throws", async () => {
    async function* source(): AsyncGenerator<SourceUnit> {
      yield { id: "a.py", content: 'password = "secret123"' };
      throw new Error("EACCES: cannot read b.py");
    }

    const report = await scanUnits(source(), catalog, {
      logger: silentLogger,
      config: { concurrency: 2 },
    });
    expect(report.incomplete).toBe(true);
    expect(report.scannedUnits).toEqual(["a.py"]);
    expect(report.findings().map((f) => `${f.unit}:${f.indicatorId}:${f.score}`)).toEqual([
      "a.py:CRED001-A:10",
    ]);
    expect(report.diagnostics).toEqual([
      { kind: "source-failed", message: "Source failed: EACCES: cannot read b.py" },
    ]);
  });

  it("reports a source that fails before yielding anything", async () => {
    const failing: Iterable<SourceUnit> = {
      [Symbol.iterator]: () => ({
        next: (): IteratorResult<SourceUnit> => {
          throw new Error("walk failed");
        },
      }),
    };

    const report = await scanUnits(failing, catalog, {
      logger: silentLogger,
      config: { concurrency: 1 },
    });
    expect(report.incomplete).toBe(true);
    expect(report.total).toBe(0);
    expect(report.diagnostics.map((d) => d.message)).toEqual(["Source failed: walk failed"]);
  });
});

describe("scanUnit", () => {
  it("throws ScanUnitError for binary content", () => {
    expect(() => scanUnit({ id: "x.bin", content: "abc\u0000def" }, catalog, config)).toThrow(ScanUnitError);
  });

  it("decodes UTF-8 bytes", () => {
    const bytes = new TextEncoder().encode('password = "secret123"\r\n');
    const result = scanUnit({ id: "app.py", content: bytes }, catalog, config);
    expect(result.findings.map((f) => [f.line, f.excerpt])).toEqual([[1, 'password = "secret123"']]);
  });
});

describe("Monotonicity", () => {
  it("adding an indicator never removes matches", () => {
    const doc = defaultDocument();
    const before = loadCatalog(doc);
    const sslRule = doc.rules.find((r) => r.category === "SSLVerificationDisabled");
    if (!sslRule) throw new Error("bundled catalog lacks an SSL rule");
    sslRule.indicators.push({
      id: "SSL001-E",
      name: "Session verify attribute",
      kind: "pattern",
      pattern: "\\.verify\\s*=",
      ignore_case: false,
      weight: 0.7,
      factor: "verify-disabled",
    });
    const after = loadCatalog(doc);

    const u = unit("app.py", ...clientSource.split("\n"), "session.verify = False");
    const beforeMatches = matchUnit(u, before, config);
    const afterMatches = matchUnit(u, after, config);
    expect(afterMatches.length).toBeGreaterThanOrEqual(beforeMatches.length);
    const key = (m: { indicatorId: string; line: number }) => `${m.indicatorId}@${m.line}`;
    const afterKeys = new Set(afterMatches.map(key));
    for (const m of beforeMatches) expect(afterKeys.has(key(m))).toBe(true);
  });
});
