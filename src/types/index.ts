export interface ProjectPaths {
	root: string;
	docs: string;
	indexFile: string;
}

// Flags accepted by the build command

export interface BuildOptions {
	skipInstall?: boolean;
	verbose?: boolean;
}

export interface BuildConfig {
	pip: string;
	make: string;
	packages: string[];
	skipInstall: boolean;
	verbose: boolean;
}
