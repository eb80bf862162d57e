import path from "node:path";
import { fileURLToPath } from "node:url";
import type { ProjectPaths } from "../types/index.js";

export const DOCS_DIR_NAME = "docs";

/**
 * Resolve the repository layout from the entry script's own URL.
 * The root is the parent of the directory holding the script, so the
 * result does not depend on the current working directory.
 */
export function resolveProjectPaths(scriptUrl: string | URL): ProjectPaths {
	const scriptDir = path.dirname(fileURLToPath(scriptUrl));
	const root = path.resolve(scriptDir, "..");
	const docs = path.join(root, DOCS_DIR_NAME);

	return {
		root,
		docs,
		indexFile: path.join(docs, "build", "html", "index.html"),
	};
}

export function toFileUrl(filePath: string): string {
	return `file://${path.resolve(filePath)}`;
}
