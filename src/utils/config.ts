import type { BuildConfig, BuildOptions } from "../types/index.js";

export const DEFAULT_PACKAGES = ["sphinx", "sphinx_rtd_theme"];

function fromEnv(
	env: NodeJS.ProcessEnv,
	key: string,
): string | undefined {
	const value = env[key]?.trim();
	return value ? value : undefined;
}

/**
 * Resolve build settings from CLI flags, environment variables and defaults.
 * Priority: CLI flags > environment variables > defaults
 */
export function resolveConfig(
	options: BuildOptions = {},
	env: NodeJS.ProcessEnv = process.env,
): BuildConfig {
	return {
		pip: fromEnv(env, "BUILD_DOCS_PIP") ?? "pip",
		make: fromEnv(env, "BUILD_DOCS_MAKE") ?? "make",
		packages: [...DEFAULT_PACKAGES],
		skipInstall: options.skipInstall ?? false,
		verbose: options.verbose ?? false,
	};
}
