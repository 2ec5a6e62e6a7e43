/**
 * Options for reading the input diagram.
 */
export interface ReadOptions {
	/**
	 * Write the built-in sample diagram to the path when nothing exists there yet.
	 */
	createSample: boolean;
}

/**
 * A diagram read from disk.
 */
export interface DiagramFile {
	/**
	 * Absolute path the diagram was read from.
	 */
	path: string;
	/**
	 * File content as UTF-8 string.
	 */
	content: string;
	/**
	 * True when the sample diagram was written to `path` during this read.
	 */
	sampleCreated: boolean;
}
