/**
 * A generated source file that reached disk.
 */
export interface WrittenArtifact {
	/**
	 * Declared type name the file was generated from.
	 */
	name: string;
	/**
	 * Absolute path of the written file.
	 */
	path: string;
}

/**
 * Outcome of writing one generation run's artifacts.
 */
export interface WriteResult {
	/**
	 * Absolute path of the output directory.
	 */
	outputDir: string;
	written: WrittenArtifact[];
	/**
	 * Number of artifacts that could not be written.
	 */
	failed: number;
}
