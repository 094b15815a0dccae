// =============================================================================
// Config file discovery paths
// =============================================================================
// Candidate paths the CLI probes for the project's config, in probe order:
// each directory is searched for every base name and extension before the next.

const BASE_NAMES = ["fundflow.config", "fundflow"] as const;

const EXTENSIONS = [".ts", ".mts", ".js", ".mjs", ".json"] as const;

const DIRECTORIES = ["", "config/", "src/", "src/config/", "server/"] as const;

export const possibleConfigPaths: readonly string[] = DIRECTORIES.flatMap((dir) =>
	BASE_NAMES.flatMap((base) => EXTENSIONS.map((ext) => `${dir}${base}${ext}`)),
);
