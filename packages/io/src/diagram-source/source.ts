import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { IoEvent, PipelinePhase } from "@plantforge/constants";
import type { PipelineEventBus } from "@plantforge/event-bus";
import { errorCode, errorMessage, toUserMessage } from "../errors";
import type { DiagramFile, ReadOptions } from "./types";

const SAMPLE_DIAGRAM_PATH = fileURLToPath(new URL("../../assets/sample-diagram.puml", import.meta.url));

/**
 * Reads the input diagram, seeding it with the built-in sample when asked to.
 * Failures are reported on the bus and yield `undefined`.
 */
export class DiagramSource {
	public async read(
		path: string,
		options: ReadOptions,
		bus?: PipelineEventBus,
	): Promise<DiagramFile | undefined> {
		const absolutePath = resolve(path);
		let sampleCreated = false;

		try {
			if (options.createSample && !(await this.exists(absolutePath))) {
				await this.writeSample(absolutePath);
				sampleCreated = true;
				bus?.emitInfo(IoEvent.SAMPLE_CREATED, PipelinePhase.READ, `Created sample diagram: ${absolutePath}`, {
					file: absolutePath,
				});
			}

			const content = await readFile(absolutePath, "utf-8");
			bus?.emitInfo(IoEvent.FILE_READ, PipelinePhase.READ, "Read diagram", {
				file: absolutePath,
				bytes: Buffer.byteLength(content),
			});

			return { path: absolutePath, content, sampleCreated };
		} catch (error: unknown) {
			const code = errorCode(error);
			bus?.emitError(IoEvent.FILE_READ, PipelinePhase.READ, {
				path: absolutePath,
				message: errorMessage(error),
				code,
				userMessage: toUserMessage(code),
			});
			return undefined;
		}
	}

	/**
	 * Text of the built-in sample diagram.
	 */
	public async loadSample(): Promise<string> {
		return readFile(SAMPLE_DIAGRAM_PATH, "utf-8");
	}

	private async writeSample(path: string): Promise<void> {
		const sample = await this.loadSample();
		await mkdir(dirname(path), { recursive: true });
		await writeFile(path, sample, "utf-8");
	}

	private async exists(path: string): Promise<boolean> {
		try {
			await stat(path);
			return true;
		} catch (error: unknown) {
			if (errorCode(error) === "ENOENT") return false;
			throw error;
		}
	}
}
