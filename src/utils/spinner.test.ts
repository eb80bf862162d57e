import { beforeEach, describe, expect, it, vi } from "vitest";
import { createSpinner, withSpinner } from "./spinner.js";

vi.mock("ora", () => {
	const mockSpinner = {
		start: vi.fn().mockReturnThis(),
		succeed: vi.fn().mockReturnThis(),
		fail: vi.fn().mockReturnThis(),
		stop: vi.fn().mockReturnThis(),
		text: "",
		color: "cyan" as const,
	};
	return {
		default: vi.fn(() => mockSpinner),
	};
});

import ora from "ora";

const mockOra = vi.mocked(ora);

describe("spinner utilities", () => {
	beforeEach(() => {
		vi.clearAllMocks();
	});

	describe("createSpinner", () => {
		it("should create a cyan spinner by default", () => {
			createSpinner("Building html documentation");
			expect(mockOra).toHaveBeenCalledWith({
				text: "Building html documentation",
				color: "cyan",
				isSilent: false,
			});
		});

		it("should create a silent spinner when disabled", () => {
			createSpinner("Upgrading pip", false);
			expect(mockOra).toHaveBeenCalledWith({
				text: "Upgrading pip",
				color: "cyan",
				isSilent: true,
			});
		});

		it("should return the ora instance", () => {
			const spinner = createSpinner("Installing sphinx");
			expect(spinner).toBe(mockOra.mock.results[0].value);
			expect(spinner.start).toBeDefined();
			expect(spinner.succeed).toBeDefined();
			expect(spinner.fail).toBeDefined();
		});
	});

	describe("withSpinner", () => {
		it("should start spinner before executing function", async () => {
			const mockFn = vi.fn().mockResolvedValue("result");
			await withSpinner("Upgrading pip", mockFn);
			const spinner = mockOra.mock.results[0].value;
			expect(spinner.start).toHaveBeenCalled();
			expect(mockFn).toHaveBeenCalledTimes(1);
		});

		it("should succeed spinner with the done text when function resolves", async () => {
			const mockFn = vi.fn().mockResolvedValue(undefined);
			await withSpinner("Upgrading pip", mockFn, "pip is up to date");
			const spinner = mockOra.mock.results[0].value;
			expect(spinner.succeed).toHaveBeenCalledWith("pip is up to date");
			expect(spinner.fail).not.toHaveBeenCalled();
		});

		it("should default the done text to the spinner text", async () => {
			await withSpinner("Upgrading pip", vi.fn().mockResolvedValue(undefined));
			const spinner = mockOra.mock.results[0].value;
			expect(spinner.succeed).toHaveBeenCalledWith("Upgrading pip");
		});

		it("should fail spinner and rethrow when function rejects", async () => {
			const error = new Error("make exited with 2");
			const mockFn = vi.fn().mockRejectedValue(error);
			await expect(
				withSpinner("Building html documentation", mockFn),
			).rejects.toThrow(error);
			const spinner = mockOra.mock.results[0].value;
			expect(spinner.fail).toHaveBeenCalledWith(
				"Building html documentation failed",
			);
			expect(spinner.succeed).not.toHaveBeenCalled();
		});

		it("should create a silent spinner when disabled", async () => {
			await withSpinner(
				"Upgrading pip",
				vi.fn().mockResolvedValue(undefined),
				"done",
				false,
			);
			expect(mockOra).toHaveBeenCalledWith({
				text: "Upgrading pip",
				color: "cyan",
				isSilent: true,
			});
		});

		it("should return result from function", async () => {
			const mockFn = vi.fn().mockResolvedValue({ data: "test" });
			const result = await withSpinner("Loading...", mockFn);
			expect(result).toEqual({ data: "test" });
		});
	});
});
