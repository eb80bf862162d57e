import { log } from "./logger.js";
import { toFileUrl } from "./paths.js";

export function formatIndexMessage(indexFile: string): string {
	return `Documentation index file can be found at ${toFileUrl(indexFile)}`;
}

/**
 * Print the index location. Stdout gets exactly a blank line and the message.
 */
export function printIndexLocation(indexFile: string): void {
	log.blank();
	console.log(formatIndexMessage(indexFile));
}
