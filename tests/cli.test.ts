import { describe, it, expect, beforeEach } from "vitest";
import { Project } from "ts-morph";
import type { FileSystemHost } from "ts-morph";
import { readFileSync } from "fs";
import { join } from "path";
import { runCli } from "../src/cli";

const MAIN_PATH = "/repo/services/ledger-service/cmd/ledger/main.go";

const COMPOSE = [
  "services:",
  "  ledger:",
  "    healthcheck:",
  '      test: ["CMD", "wget", "-qO-", "http://localhost:8080/healthz"]',
  "      interval: 10s",
  "",
].join("\n");

describe("go-inject CLI", () => {
  let fileSystem: FileSystemHost;
  let lines: string[];
  let errors: string[];

  const cli = (...args: string[]) =>
    runCli(["node", "go-inject", ...args], {
      fileSystem,
      color: false,
      write: (line) => lines.push(line),
      writeError: (line) => errors.push(line),
    });

  beforeEach(() => {
    fileSystem = new Project({ useInMemoryFileSystem: true }).getFileSystem();
    fileSystem.writeFileSync(
      MAIN_PATH,
      readFileSync(join(__dirname, "fixtures/main.go"), "utf-8")
    );
    fileSystem.writeFileSync("/repo/docker-compose.yml", COMPOSE);
    lines = [];
    errors = [];
  });

  describe("run", () => {
    it("should apply a preset under the given root", () => {
      expect(cli("run", "main-logging", "--root", "/repo")).toBe(0);

      expect(lines).toEqual([
        "🚀 main-logging: Pass the service logger to gRPC handler constructors in main\n",
        "✓ Updated services/ledger-service/cmd/ledger/main.go",
        "\nTotal: 1 files updated",
      ]);
      expect(fileSystem.readFileSync(MAIN_PATH)).toContain(
        "\t\tapplication.NewGetBalanceUseCase(),\n\t\tlogger,\n\t)"
      );
      expect(errors).toEqual([]);
    });

    it("should leave files untouched in dry-run mode", () => {
      const before = fileSystem.readFileSync(MAIN_PATH);

      expect(cli("run", "main-logging", "--root", "/repo", "--dry-run")).toBe(0);

      expect(lines).toContain("\nTotal: 1 files would be updated");
      expect(fileSystem.readFileSync(MAIN_PATH)).toBe(before);
    });

    it("should exit with 1 when a codemod cannot be loaded", () => {
      expect(cli("run", "missing-preset", "--root", "/repo")).toBe(1);

      expect(lines).toEqual([]);
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatch(/^❌ Failed to read .*missing-preset\.json: /);
    });
  });

  describe("healthcheck", () => {
    it("should add the start period to the compose file", () => {
      expect(cli("healthcheck", "/repo/docker-compose.yml")).toBe(0);

      expect(lines).toEqual([
        "✓ Added start_period to service healthchecks in /repo/docker-compose.yml",
      ]);
      expect(fileSystem.readFileSync("/repo/docker-compose.yml")).toBe(
        COMPOSE.replace("      interval: 10s\n", "      interval: 10s\n      start_period: 30s\n")
      );
    });

    it("should report a document that needs no change", () => {
      cli("healthcheck", "/repo/docker-compose.yml");
      lines = [];

      expect(cli("healthcheck", "/repo/docker-compose.yml")).toBe(0);
      expect(lines).toEqual(["- No changes needed: /repo/docker-compose.yml"]);
    });

    it("should exit with 1 when the file is missing", () => {
      expect(cli("healthcheck", "/repo/missing.yml")).toBe(1);

      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatch(/^❌ Failed to read \/repo\/missing\.yml: /);
    });
  });

  it("should list the shipped presets", () => {
    expect(cli("list")).toBe(0);
    expect(lines).toEqual(["handler-logging", "main-logging", "test-logging"]);
  });
});
