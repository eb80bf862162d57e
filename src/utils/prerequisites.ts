import path from "node:path";
import fs from "fs-extra";
import type { BuildConfig, ProjectPaths } from "../types/index.js";
import { isCliInstalled } from "./exec.js";

export interface PrerequisiteCheckResult {
	passed: boolean;
	errors: string[];
	warnings: string[];
}

// Names make looks for, in its own search order
const MAKEFILE_NAMES = ["GNUmakefile", "makefile", "Makefile"];

async function hasMakefile(dir: string): Promise<boolean> {
	for (const name of MAKEFILE_NAMES) {
		if (await fs.pathExists(path.join(dir, name))) {
			return true;
		}
	}
	return false;
}

/**
 * Check that the toolchain and the docs directory are in place
 */
export async function checkPrerequisites(
	config: BuildConfig,
	paths: ProjectPaths,
): Promise<PrerequisiteCheckResult> {
	const errors: string[] = [];
	const warnings: string[] = [];

	// pip is not needed when installs are skipped
	const required = config.skipInstall
		? [config.make]
		: [config.pip, config.make];
	const missing: string[] = [];
	for (const cli of required) {
		if (!(await isCliInstalled(cli))) {
			missing.push(cli);
		}
	}
	if (missing.length > 0) {
		errors.push(`Missing required commands on PATH: ${missing.join(", ")}`);
	}

	if (!(await fs.pathExists(paths.docs))) {
		errors.push(`Docs directory not found: ${paths.docs}`);
	} else if (!(await hasMakefile(paths.docs))) {
		warnings.push(`No Makefile in ${paths.docs}; the build will likely fail`);
	}

	return {
		passed: errors.length === 0,
		errors,
		warnings,
	};
}

/**
 * Format prerequisite check results for display
 */
export function formatPrerequisiteResults(
	result: PrerequisiteCheckResult,
): string {
	const lines: string[] = [];

	if (result.errors.length > 0) {
		lines.push("Errors:");
		for (const error of result.errors) {
			lines.push(`  - ${error}`);
		}
	}

	if (result.warnings.length > 0) {
		lines.push("Warnings:");
		for (const warning of result.warnings) {
			lines.push(`  - ${warning}`);
		}
	}

	return lines.join("\n");
}
