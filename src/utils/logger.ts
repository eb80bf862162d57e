import kleur from "kleur";

// Everything but blank lines goes to stderr; stdout is reserved for results
export const log = {
	warn: (msg: string) => console.error(kleur.yellow("warn"), msg),
	error: (msg: string) => console.error(kleur.red("error"), msg),
	step: (msg: string) => console.error(kleur.blue("->"), msg),
	// Echo of a child tool's output, one indented dim line per input line
	detail: (output: string) => {
		for (const line of output.split("\n")) {
			console.error(kleur.dim(`  ${line}`));
		}
	},
	blank: () => console.log(),
};
