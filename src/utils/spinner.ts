import ora, { type Ora } from "ora";

export function createSpinner(text: string, enabled = true): Ora {
	return ora({
		text,
		color: "cyan",
		isSilent: !enabled,
	});
}

/**
 * Run `fn` behind a spinner. On failure the spinner fails with
 * "<text> failed" and the error is rethrown.
 */
export async function withSpinner<T>(
	text: string,
	fn: () => Promise<T>,
	doneText = text,
	enabled = true,
): Promise<T> {
	const spinner = createSpinner(text, enabled).start();
	try {
		const result = await fn();
		spinner.succeed(doneText);
		return result;
	} catch (error) {
		spinner.fail(`${text} failed`);
		throw error;
	}
}
