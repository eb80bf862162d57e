import { type Options, execa } from "execa";
import type { BuildConfig } from "../types/index.js";

export interface RunOptions {
	/** Stream the child's output instead of capturing it */
	inherit?: boolean;
}

export async function execCommand(
	command: string,
	args: string[],
	options?: Options,
): Promise<{ stdout: string; stderr: string }> {
	const result = await execa(command, args, {
		stdio: "pipe",
		...options,
	});
	return {
		stdout: typeof result.stdout === "string" ? result.stdout : "",
		stderr: typeof result.stderr === "string" ? result.stderr : "",
	};
}

function stdioFor(run?: RunOptions): Options {
	return run?.inherit ? { stdio: "inherit" } : {};
}

export async function pipUpgradeSelf(
	config: BuildConfig,
	run?: RunOptions,
): Promise<void> {
	await execCommand(config.pip, ["install", "--upgrade", "pip"], stdioFor(run));
}

export async function pipInstallUpgrade(
	config: BuildConfig,
	run?: RunOptions,
): Promise<void> {
	await execCommand(
		config.pip,
		["install", "--upgrade", ...config.packages],
		stdioFor(run),
	);
}

export async function makeTarget(
	config: BuildConfig,
	docsDir: string,
	run?: RunOptions,
): Promise<void> {
	await execCommand(config.make, ["-C", docsDir, "html"], {
		cwd: docsDir,
		...stdioFor(run),
	});
}

export async function isCliInstalled(cli: string): Promise<boolean> {
	try {
		await execCommand("which", [cli]);
		return true;
	} catch {
		return false;
	}
}

/**
 * Exit code to propagate for a failed step: the child's own code when
 * it exited with one, otherwise 1.
 */
export function exitCodeOf(error: unknown): number {
	if (error && typeof error === "object" && "exitCode" in error) {
		const { exitCode } = error;
		if (typeof exitCode === "number" && exitCode > 0) {
			return exitCode;
		}
	}
	return 1;
}

/**
 * One-line description of a failure, without the child's output
 */
export function failureSummary(error: unknown): string {
	if (error && typeof error === "object" && "shortMessage" in error) {
		const { shortMessage } = error;
		if (typeof shortMessage === "string" && shortMessage) {
			return shortMessage;
		}
	}
	return error instanceof Error ? error.message : String(error);
}

/**
 * Text the failing tool printed, preferring stderr
 */
export function describeFailure(error: unknown): string {
	if (error && typeof error === "object") {
		const output: { stderr?: unknown; stdout?: unknown } = error;
		for (const key of ["stderr", "stdout"] as const) {
			if (key in output) {
				const value: unknown = output[key];
				if (typeof value === "string" && value.trim()) {
					return value.trim();
				}
			}
		}
	}
	return error instanceof Error ? error.message : String(error);
}
