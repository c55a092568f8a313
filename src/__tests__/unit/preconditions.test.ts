import { describe, it, expect } from "vitest";
import { AbortedError, PreconditionError } from "../../errors";
import { checkTools, guardSsh, isSshSession, requireRoot } from "../../system/preconditions";
import { MockCommandRunner } from "../helpers/mockCommandRunner";
import { ScriptedPrompter } from "../helpers/scriptedPrompter";
import { captureReporter, silentLogger } from "../helpers/fixtures";

describe("requireRoot", () => {
	it("passes for uid 0", () => {
		expect(() => requireRoot(0)).not.toThrow();
	});

	it("rejects other users and unknown uids", () => {
		for (const uid of [1000, undefined]) {
			try {
				requireRoot(uid);
				expect.unreachable();
			} catch (error) {
				if (!(error instanceof PreconditionError)) throw error;
				expect(error.lines).toEqual([
					"Error: This command requires root privileges.",
					"Please run: sudo fwprune",
				]);
				expect(error.exitCode).toBe(1);
			}
		}
	});
});

describe("checkTools", () => {
	it("passes when pkg and fwget exist", () => {
		expect(() => checkTools(new MockCommandRunner(), silentLogger())).not.toThrow();
	});

	it("lists every missing tool", () => {
		const runner = new MockCommandRunner();
		runner.setAvailable();

		try {
			checkTools(runner, silentLogger());
			expect.unreachable();
		} catch (error) {
			if (!(error instanceof PreconditionError)) throw error;
			expect(error.lines).toEqual([
				"Error: Required command 'pkg' not found in PATH.",
				"Error: Required command 'fwget' not found in PATH.",
				"",
				"Please ensure all required tools are installed.",
			]);
		}
	});

	it("reports only the tool that is missing", () => {
		const runner = new MockCommandRunner();
		runner.setAvailable("pkg");

		expect(() => checkTools(runner, silentLogger())).toThrow(
			"Error: Required command 'fwget' not found in PATH.",
		);
	});
});

describe("isSshSession", () => {
	it("detects SSH_TTY or SSH_CONNECTION", () => {
		expect(isSshSession({ SSH_TTY: "/dev/pts/0" })).toBe(true);
		expect(isSshSession({ SSH_CONNECTION: "192.0.2.1 50000 192.0.2.2 22" })).toBe(true);
		expect(isSshSession({ SSH_TTY: "" })).toBe(false);
		expect(isSshSession({})).toBe(false);
	});
});

describe("guardSsh", () => {
	const ssh = { SSH_CONNECTION: "192.0.2.1 50000 192.0.2.2 22" };

	it("does nothing outside SSH", async () => {
		const prompter = new ScriptedPrompter();
		const { streams, reporter } = captureReporter();

		await guardSsh({ env: {}, stdinIsTTY: false, prompter, reporter, logger: silentLogger() });

		expect(prompter.asked).toBe(0);
		expect(streams.out()).toBe("");
		expect(streams.err()).toBe("");
	});

	it("refuses non-interactive SSH sessions", async () => {
		const { reporter } = captureReporter();
		const run = guardSsh({
			env: ssh,
			stdinIsTTY: false,
			prompter: new ScriptedPrompter("y"),
			reporter,
			logger: silentLogger(),
		});

		await expect(run).rejects.toBeInstanceOf(PreconditionError);
		await expect(run).rejects.toThrow("Error: Running over SSH in non-interactive mode.");
	});

	it("continues after the warning when confirmed", async () => {
		const { streams, reporter } = captureReporter();

		await guardSsh({
			env: ssh,
			stdinIsTTY: true,
			prompter: new ScriptedPrompter("yes"),
			reporter,
			logger: silentLogger(),
		});

		expect(streams.err()).toContain("│ WARNING: SSH Session Detected                               │");
		expect(streams.err().endsWith("\nContinue anyway? [y/N]: ")).toBe(true);
		expect(streams.out()).toBe("\n");
	});

	it("aborts when declined", async () => {
		const { reporter } = captureReporter();
		const run = guardSsh({
			env: ssh,
			stdinIsTTY: true,
			prompter: new ScriptedPrompter("n"),
			reporter,
			logger: silentLogger(),
		});

		await expect(run).rejects.toBeInstanceOf(AbortedError);
		await expect(run).rejects.toThrow("Aborted.");
	});

	it("aborts at end of input", async () => {
		const { reporter } = captureReporter();

		try {
			await guardSsh({ env: ssh, stdinIsTTY: true, prompter: new ScriptedPrompter(), reporter, logger: silentLogger() });
			expect.unreachable();
		} catch (error) {
			if (!(error instanceof AbortedError)) throw error;
			expect(error.lines).toEqual(["", "EOF detected. Aborted."]);
		}
	});
});
