import { Command } from "commander";
import fs from "fs-extra";
import type {
	BuildConfig,
	BuildOptions,
	ProjectPaths,
} from "../types/index.js";
import { resolveConfig } from "../utils/config.js";
import {
	type RunOptions,
	describeFailure,
	exitCodeOf,
	failureSummary,
	makeTarget,
	pipInstallUpgrade,
	pipUpgradeSelf,
} from "../utils/exec.js";
import { log } from "../utils/logger.js";
import { printIndexLocation } from "../utils/output.js";
import {
	checkPrerequisites,
	formatPrerequisiteResults,
} from "../utils/prerequisites.js";
import { withSpinner } from "../utils/spinner.js";

export interface BuildStep {
	title: string;
	doneTitle: string;
	run: (options: RunOptions) => Promise<void>;
}

/**
 * Steps of one build, in order. Installs come first unless skipped.
 */
export function planSteps(
	config: BuildConfig,
	paths: ProjectPaths,
): BuildStep[] {
	const steps: BuildStep[] = [];

	if (!config.skipInstall) {
		steps.push({
			title: `Upgrading ${config.pip}`,
			doneTitle: `${config.pip} is up to date`,
			run: (options) => pipUpgradeSelf(config, options),
		});
		steps.push({
			title: `Installing ${config.packages.join(", ")}`,
			doneTitle: `Installed ${config.packages.join(", ")}`,
			run: (options) => pipInstallUpgrade(config, options),
		});
	}

	steps.push({
		title: "Building html documentation",
		doneTitle: "Documentation built",
		run: (options) => makeTarget(config, paths.docs, options),
	});

	return steps;
}

/**
 * Run every step, stopping at the first failure
 */
export async function runBuild(
	config: BuildConfig,
	paths: ProjectPaths,
): Promise<void> {
	const prerequisites = await checkPrerequisites(config, paths);
	if (!prerequisites.passed) {
		throw new Error(
			`Prerequisites not met:\n${formatPrerequisiteResults(prerequisites)}`,
		);
	}
	for (const warning of prerequisites.warnings) {
		log.warn(warning);
	}

	for (const step of planSteps(config, paths)) {
		// The spinner is silent in verbose mode, so announce the step instead
		if (config.verbose) {
			log.step(step.title);
		}
		await withSpinner(
			step.title,
			() => step.run({ inherit: config.verbose }),
			step.doneTitle,
			!config.verbose,
		);
	}

	if (!(await fs.pathExists(paths.indexFile))) {
		throw new Error(`Build finished but ${paths.indexFile} was not created`);
	}
}

export function createBuildCommand(paths: ProjectPaths): Command {
	return new Command()
		.name("build-docs")
		.description("Install the documentation toolchain and build the HTML docs")
		.option("--skip-install", "Skip upgrading pip and the doc packages")
		.option("--verbose", "Stream tool output instead of showing progress")
		.action(async (options: BuildOptions) => {
			try {
				const config = resolveConfig(options);
				await runBuild(config, paths);
				printIndexLocation(paths.indexFile);
			} catch (error) {
				const summary = failureSummary(error);
				log.error(`Failed to build documentation: ${summary}`);
				const output = describeFailure(error);
				if (output !== summary) {
					log.detail(output);
				}
				process.exit(exitCodeOf(error));
			}
		});
}
