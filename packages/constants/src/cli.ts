export const CLIErrors = {
	CONFLICTING_FLAGS:
		"Conflicting flags: --verbose and --quiet cannot be used together",
	INVALID_CONFIG: (path: string) => `Invalid config file: parse error at ${path}`,
	INVALID_CONFIG_KEY: (path: string, key: string, expected: string) =>
		`Invalid config file ${path}: "${key}" must be ${expected}`,
	INVALID_PACKAGE: (name: string) =>
		`Invalid package name "${name}". Expected dot-separated identifiers`,
} as const;

export const CLIDescriptions = {
	PROGRAM: "Generate Java source skeletons from PlantUML class diagrams",
	GENERATE: "Parse a diagram and write one Java file per declared type",
	PARSE: "Parse a diagram and print its declarations and relationships",
} as const;
