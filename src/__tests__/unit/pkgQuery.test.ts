import { describe, it, expect } from "vitest";
import { interpretInstalledQuery } from "../../domain/pkgQuery";
import { CommandFailedError } from "../../errors";
import { commandResult } from "../helpers/mockCommandRunner";

describe("interpretInstalledQuery", () => {
	it("returns the normalized names on success", () => {
		const result = commandResult(0, "wifi-firmware-rtw88-kmod\nintel-firmware\nintel-firmware\n");
		expect(interpretInstalledQuery(result)).toEqual(["intel-firmware", "wifi-firmware-rtw88-kmod"]);
	});

	it("ignores warnings printed to stderr on success", () => {
		const result = commandResult(
			0,
			"wifi-firmware-rtw88-kmod\n",
			"pkg: Warning: Major OS version upgrade detected\n",
		);
		expect(interpretInstalledQuery(result)).toEqual(["wifi-firmware-rtw88-kmod"]);
	});

	it("keeps only names from the managed families", () => {
		const result = commandResult(0, "intel-firmware\nfirefox\nmy-wifi-firmware-tool\nrtlbt-firmware\n");
		expect(interpretInstalledQuery(result)).toEqual(["intel-firmware", "rtlbt-firmware"]);
	});

	it("treats a non-zero exit with no output as no matches", () => {
		expect(interpretInstalledQuery(commandResult(1))).toEqual([]);
	});

	it("treats a 'no packages' message as no matches", () => {
		expect(interpretInstalledQuery(commandResult(1, "", "pkg: No packages matching '^(...)'\n"))).toEqual([]);
	});

	it("throws on any other failure", () => {
		const result = commandResult(70, "", "pkg: sqlite error while executing query\n");
		expect(() => interpretInstalledQuery(result)).toThrow(CommandFailedError);
		expect(() => interpretInstalledQuery(result)).toThrow(
			"pkg query failed: pkg: sqlite error while executing query",
		);
	});

	it("throws when pkg could not be started", () => {
		const result = { ...commandResult(null), error: new Error("spawn pkg ENOENT") };
		expect(() => interpretInstalledQuery(result)).toThrow("pkg query failed: spawn pkg ENOENT");
	});
});
