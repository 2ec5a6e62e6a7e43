import { mkdir, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { IoEvent, PipelinePhase } from "@plantforge/constants";
import type { PipelineEventBus } from "@plantforge/event-bus";
import { errorCode, errorMessage, toUserMessage } from "../errors";
import type { WriteResult } from "./types";

/**
 * Persists generated sources as `<name><extension>` inside an output directory,
 * creating the directory when it does not exist. Each write and each failure
 * is reported on the bus; one failed file does not stop the others.
 */
export class ArtifactWriter {
	public async write(
		outputDir: string,
		sources: ReadonlyMap<string, string>,
		extension: string,
		bus?: PipelineEventBus,
	): Promise<WriteResult> {
		const absoluteDir = resolve(outputDir);
		const result: WriteResult = { outputDir: absoluteDir, written: [], failed: 0 };

		try {
			await mkdir(absoluteDir, { recursive: true });
		} catch (error: unknown) {
			const code = errorCode(error);
			bus?.emitError(IoEvent.FILE_WRITE, PipelinePhase.WRITE, {
				path: absoluteDir,
				message: errorMessage(error),
				code,
				userMessage: toUserMessage(code),
			});
			result.failed = sources.size;
			return result;
		}

		for (const [name, content] of sources) {
			const path = join(absoluteDir, `${name}${extension}`);
			try {
				await writeFile(path, content, "utf-8");
				result.written.push({ name, path });
				bus?.emitInfo(IoEvent.FILE_WRITE, PipelinePhase.WRITE, `Generated ${name}${extension}`, { file: path });
			} catch (error: unknown) {
				const code = errorCode(error);
				result.failed++;
				bus?.emitError(IoEvent.FILE_WRITE, PipelinePhase.WRITE, {
					path,
					message: errorMessage(error),
					code,
					userMessage: toUserMessage(code),
				});
			}
		}

		return result;
	}
}
