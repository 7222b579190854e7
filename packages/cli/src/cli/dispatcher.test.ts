/**
 * Tests for the CLI dispatcher
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { fileURLToPath } from "node:url";
import { join } from "node:path";
import { createRecordingLogger } from "../tests/recording-logger.js";
import { runCli } from "./dispatcher.js";

const fixturesDir = fileURLToPath(new URL("../tests/fixtures/", import.meta.url));

describe("runCli", () => {
  it("should apply recordlens.json from the working directory", async () => {
    const recording = createRecordingLogger();
    const exitCode = await runCli(["classify", "unit.yaml"], {
      cwd: fixturesDir,
      logger: recording.logger,
    });

    expect(exitCode).to.equal(0);
    expect(recording.results).to.deep.equal([
      [
        "record Demo.Unit",
        "  auto-properties: (none)",
        "  member order: (empty)",
        "  [generated] static System.Boolean op_Equality(Demo.Unit?, Demo.Unit?)",
        "  [generated] Demo.Unit <Clone>$()",
      ].join("\n"),
    ]);
    expect(recording.errors).to.deep.equal([]);
  });

  it("should exit 2 when the dump cannot be loaded", async () => {
    const recording = createRecordingLogger();
    const exitCode = await runCli(["inspect", "missing.yaml"], {
      cwd: fixturesDir,
      logger: recording.logger,
    });

    const path = join(fixturesDir, "missing.yaml");
    expect(exitCode).to.equal(2);
    expect(recording.errors).to.deep.equal([
      `Failed to load ${path}`,
      `error RLN9001: Dump file not found: ${path}`,
    ]);
  });

  it("should exit 1 on an unknown command", async () => {
    const recording = createRecordingLogger();
    const exitCode = await runCli(["decompile", "unit.yaml"], {
      cwd: fixturesDir,
      logger: recording.logger,
    });

    expect(exitCode).to.equal(1);
    expect(recording.errors[0]).to.equal("Unknown command 'decompile'");
  });

  it("should exit 1 on an unknown option", async () => {
    const recording = createRecordingLogger();
    const exitCode = await runCli(["classify", "unit.yaml", "--fast"], {
      cwd: fixturesDir,
      logger: recording.logger,
    });

    expect(exitCode).to.equal(1);
    expect(recording.errors).to.deep.equal(["Unknown option '--fast'"]);
  });

  it("should exit 1 without a dump file", async () => {
    const recording = createRecordingLogger();
    const exitCode = await runCli(["classify"], {
      cwd: fixturesDir,
      logger: recording.logger,
    });

    expect(exitCode).to.equal(1);
    expect(recording.errors).to.deep.equal([
      "Dump file required",
      "Usage: recordlens classify <dump.yaml>",
    ]);
  });

  it("should exit 1 when the named config is missing", async () => {
    const recording = createRecordingLogger();
    const exitCode = await runCli(["classify", "unit.yaml", "-c", "absent.json"], {
      cwd: fixturesDir,
      logger: recording.logger,
    });

    expect(exitCode).to.equal(1);
    expect(recording.errors).to.deep.equal([
      `Config file not found: ${join(fixturesDir, "absent.json")}`,
    ]);
  });

  it("should exit 130 when cancelled", async () => {
    const recording = createRecordingLogger();
    const controller = new AbortController();
    controller.abort(new Error("Interrupted"));
    const exitCode = await runCli(["classify", "unit.yaml"], {
      cwd: fixturesDir,
      logger: recording.logger,
      signal: controller.signal,
    });

    expect(exitCode).to.equal(130);
    expect(recording.errors).to.deep.equal(["Cancelled"]);
  });
});
