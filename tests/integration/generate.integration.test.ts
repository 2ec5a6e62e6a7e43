import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { access, mkdtemp, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { GeneratePipeline, type Pipeline, type PipelineConfig, type PipelineResult } from "../../packages/core/src";
import type { Logger, AppLogObj } from "@plantforge/logger";
import { CLI, ExitCode } from "../../apps/cli/src";

const FIXTURES = fileURLToPath(new URL("../fixtures/diagrams", import.meta.url));

function fixture(name: string): string {
    return join(FIXTURES, name);
}

// ============================================================
// Spy Pipeline: wraps real GeneratePipeline, captures logger and result
// ============================================================

function createSpyPipeline() {
    const real = new GeneratePipeline();
    let capturedLogger: Logger<AppLogObj> | undefined;
    let capturedResult: PipelineResult | undefined;

    const pipeline: Pipeline = {
        async run(config: PipelineConfig, logger?: Logger<AppLogObj>): Promise<PipelineResult> {
            capturedLogger = logger;
            capturedResult = await real.run(config, logger);
            return capturedResult;
        },
    };

    return {
        pipeline,
        getLogger: () => capturedLogger,
        getResult: () => capturedResult,
    };
}

async function exists(path: string): Promise<boolean> {
    try {
        await access(path);
        return true;
    } catch {
        return false;
    }
}

describe("CLI ↔ Pipeline Integration", () => {
    let testDir: string;

    beforeEach(async () => {
        testDir = await mkdtemp(join(tmpdir(), "plantforge-integration-"));
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(testDir, { recursive: true, force: true });
    });

    describe("Feature: Generate", () => {
        it("should write one Java file per declared type", async () => {
            const outputDir = join(testDir, "java");
            const cli = new CLI(new GeneratePipeline());

            const exitCode = await cli.run([fixture("university.puml"), "-o", outputDir, "--no-config", "-q"]);

            expect(exitCode).toBe(ExitCode.SUCCESS);
            expect((await readdir(outputDir)).sort()).toEqual([
                "Course.java",
                "Payable.java",
                "Person.java",
                "Professor.java",
                "Student.java",
            ]);
        });

        it("should render a subclass with its parent's constructor parameters", async () => {
            const outputDir = join(testDir, "java");

            await new CLI(new GeneratePipeline()).run([fixture("university.puml"), "-o", outputDir, "--no-config", "-q"]);

            expect(await readFile(join(outputDir, "Professor.java"), "utf-8")).toBe(
                [
                    "public class Professor extends Person implements Payable {",
                    "    private int staffNumber;",
                    "",
                    "    public Professor(String name, String email, int staffNumber) {",
                    "        super(name, email);",
                    "        this.staffNumber = staffNumber;",
                    "    }",
                    "",
                    "    public int getStaffnumber() {",
                    "        return staffNumber;",
                    "    }",
                    "",
                    "    public void setStaffnumber(int staffNumber) {",
                    "        this.staffNumber = staffNumber;",
                    "    }",
                    "",
                    "    public void assignGrade(Student student, Course course, String grade) {",
                    "        // TODO: Implement method logic",
                    "    }",
                    "}",
                    "",
                ].join("\n"),
            );
        });

        it("should keep abstract signatures and imports", async () => {
            const outputDir = join(testDir, "java");

            await new CLI(new GeneratePipeline()).run([fixture("university.puml"), "-o", outputDir, "--no-config", "-q"]);

            const person = await readFile(join(outputDir, "Person.java"), "utf-8");
            const student = await readFile(join(outputDir, "Student.java"), "utf-8");
            expect(person).toContain("    public abstract String getRole();\n}\n");
            expect(student.split("\n").slice(0, 4)).toEqual([
                "import java.util.List;",
                "import java.util.ArrayList;",
                "",
                "public class Student extends Person {",
            ]);
        });

        it("should apply settings from a config file", async () => {
            const configPath = join(testDir, "plantforge.config.json");
            const outputDir = join(testDir, "from-config");
            await writeFile(
                configPath,
                JSON.stringify({ input: fixture("university.puml"), outputDir, packageName: "edu.uni", indent: "  " }),
            );

            const exitCode = await new CLI(new GeneratePipeline()).run(["--config", configPath, "-q"]);

            expect(exitCode).toBe(ExitCode.SUCCESS);
            expect(await readFile(join(outputDir, "Payable.java"), "utf-8")).toBe(
                "package edu.uni;\n\npublic interface Payable {\n  public double calculateSalary();\n}\n",
            );
        });

        it("should skip an unterminated body and keep the rest", async () => {
            const outputDir = join(testDir, "java");
            const spy = createSpyPipeline();

            const exitCode = await new CLI(spy.pipeline).run([fixture("broken.puml"), "-o", outputDir, "--no-config", "-q"]);

            expect(exitCode).toBe(ExitCode.SUCCESS);
            expect([...(spy.getResult()?.sources.keys() ?? [])]).toEqual(["Ledger", "Archive"]);
            expect((await readFile(join(outputDir, "Ledger.java"), "utf-8")).split("\n").slice(0, 3)).toEqual([
                "import java.util.Map;",
                "import java.util.HashMap;",
                "",
            ]);
        });
    });

    describe("Feature: Sample Diagram", () => {
        it("should create the sample and generate from it when the input is missing", async () => {
            const input = join(testDir, "diagram.puml");
            const outputDir = join(testDir, "java");

            const exitCode = await new CLI(new GeneratePipeline()).run([input, "-o", outputDir, "--no-config", "-q"]);

            expect(exitCode).toBe(ExitCode.SUCCESS);
            expect(await readFile(input, "utf-8")).toContain("title Clinic Scheduling");
            expect(await readdir(outputDir)).toHaveLength(6);
        });

        it("should fail with --no-sample and write nothing", async () => {
            const input = join(testDir, "diagram.puml");
            const outputDir = join(testDir, "java");
            const spy = createSpyPipeline();

            const exitCode = await new CLI(spy.pipeline).run([input, "-o", outputDir, "--no-sample", "--no-config", "-q"]);

            expect(exitCode).toBe(ExitCode.GENERATION_ERROR);
            expect(spy.getResult()?.errors.map((e) => e.code)).toEqual(["ENOENT"]);
            expect(await exists(input)).toBe(false);
            expect(await exists(outputDir)).toBe(false);
        });
    });

    describe("Feature: Parse and Dry Run", () => {
        it("should parse without writing anything", async () => {
            const spy = createSpyPipeline();

            const exitCode = await new CLI(spy.pipeline).run(["parse", fixture("university.puml"), "--no-config", "-q"]);

            expect(exitCode).toBe(ExitCode.SUCCESS);
            expect(spy.getResult()?.written).toEqual([]);
            expect(spy.getResult()?.stats.relationships).toBe(3);
        });

        it("should not create the output directory on --dry-run", async () => {
            const outputDir = join(testDir, "java");

            const exitCode = await new CLI(new GeneratePipeline()).run([
                fixture("university.puml"),
                "-o",
                outputDir,
                "--dry-run",
                "--no-config",
                "-q",
            ]);

            expect(exitCode).toBe(ExitCode.SUCCESS);
            expect(await exists(outputDir)).toBe(false);
        });
    });

    describe("Feature: Logger Injection", () => {
        it("should pass an info-level pretty logger by default", async () => {
            const spy = createSpyPipeline();

            await new CLI(spy.pipeline).run(["parse", fixture("university.puml"), "--no-config"]);

            expect(spy.getLogger()?.settings.type).toBe("pretty");
            expect(spy.getLogger()?.settings.minLevel).toBe(3);
        });

        it("should pass a JSON logger with --json", async () => {
            const spy = createSpyPipeline();

            await new CLI(spy.pipeline).run(["parse", fixture("university.puml"), "--json", "--no-config"]);

            expect(spy.getLogger()?.settings.type).toBe("json");
            expect(spy.getLogger()?.settings.minLevel).toBe(2);
        });

        it("should pass an error-level logger with --quiet", async () => {
            const spy = createSpyPipeline();

            await new CLI(spy.pipeline).run(["parse", fixture("university.puml"), "--quiet", "--no-config"]);

            expect(spy.getLogger()?.settings.minLevel).toBe(5);
        });
    });
});
