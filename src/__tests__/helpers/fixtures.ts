import pino from "pino";
import { ConsoleReporter } from "../../ui/console";
import type { GlyphConfig } from "../../config";

export const ASCII: GlyphConfig = { separator: "-", checkMark: "*", arrow: "->" };

export const silentLogger = () => pino({ enabled: false });

export interface CapturedStreams {
	stdout: { write: (chunk: string) => boolean };
	stderr: { write: (chunk: string) => boolean };
	out: () => string;
	err: () => string;
	outLines: () => string[];
	errLines: () => string[];
}

export function captureStreams(): CapturedStreams {
	let out = "";
	let err = "";
	return {
		stdout: {
			write: (chunk: string) => {
				out += chunk;
				return true;
			},
		},
		stderr: {
			write: (chunk: string) => {
				err += chunk;
				return true;
			},
		},
		out: () => out,
		err: () => err,
		outLines: () => out.split("\n"),
		errLines: () => err.split("\n"),
	};
}

export function captureReporter(glyphs: GlyphConfig = ASCII) {
	const streams = captureStreams();
	return { streams, reporter: new ConsoleReporter(glyphs, streams) };
}

/** `fwget -n` output with a header, the given packages, and a trailing note */
export function fwgetDryRunOutput(packages: string[]): string {
	return [
		"Needed firmware packages:",
		...packages.map((name) => `\t+ ${name}`),
		"",
		"Run without -n to install.",
		"",
	].join("\n");
}

export const SECTION_RULE = "-".repeat(70);
