import { beforeEach, describe, expect, it, vi } from "vitest";

import { OptoolNotFoundError, OptoolProcessError } from "../tools/optool-errors";
import { OptoolService } from "../tools/optool-service";

type FakeResult = { stdout: string; stderr: string; exitCode: number | undefined };

const mockExeca = vi.fn(
  async (_file: string, _args: readonly string[], _options?: unknown): Promise<FakeResult> => ({
    stdout: "",
    stderr: "",
    exitCode: 0,
  }),
);

vi.mock("execa", () => ({
  execa: (file: string, args: readonly string[], options?: unknown) => mockExeca(file, args, options),
}));

beforeEach(() => {
  mockExeca.mockReset();
});

describe("OptoolService.isAvailable", () => {
  it("accepts a zero exit", async () => {
    mockExeca.mockResolvedValueOnce({ stdout: "", stderr: "", exitCode: 0 });
    const service = new OptoolService("/opt/bin/optool");

    await expect(service.isAvailable()).resolves.toBe(true);
    expect(mockExeca).toHaveBeenCalledWith("/opt/bin/optool", ["--version"], { reject: false });
  });

  it("accepts a non-zero exit that mentions optool", async () => {
    mockExeca.mockResolvedValueOnce({ stdout: "", stderr: "OPTOOL: unknown option --version", exitCode: 2 });

    await expect(new OptoolService().isAvailable()).resolves.toBe(true);
    expect(mockExeca).toHaveBeenCalledWith("optool", ["--version"], { reject: false });
  });

  it("rejects an unrelated non-zero exit", async () => {
    mockExeca.mockResolvedValueOnce({ stdout: "", stderr: "permission denied", exitCode: 126 });

    await expect(new OptoolService().isAvailable()).resolves.toBe(false);
  });

  it("rejects a binary that never started", async () => {
    mockExeca.mockResolvedValueOnce({ stdout: "", stderr: "", exitCode: undefined });

    await expect(new OptoolService("missing-optool").isAvailable()).resolves.toBe(false);
  });

  it("treats a thrown spawn error as unavailable", async () => {
    mockExeca.mockRejectedValueOnce(new Error("spawn ENOENT"));

    await expect(new OptoolService().isAvailable()).resolves.toBe(false);
  });
});

describe("OptoolService.ensureAvailable", () => {
  it("throws OptoolNotFoundError naming the binary", async () => {
    mockExeca.mockResolvedValueOnce({ stdout: "", stderr: "", exitCode: undefined });

    await expect(new OptoolService("missing-optool").ensureAvailable()).rejects.toThrow(
      'Optool not found (tried "missing-optool"). Please install Optool and ensure it\'s in your PATH.',
    );
  });

  it("resolves when the probe succeeds", async () => {
    mockExeca.mockResolvedValueOnce({ stdout: "optool 1.0", stderr: "", exitCode: 0 });

    await expect(new OptoolService().ensureAvailable()).resolves.toBeUndefined();
  });

  it("raises the dedicated error class", async () => {
    mockExeca.mockResolvedValueOnce({ stdout: "", stderr: "", exitCode: 1 });

    await expect(new OptoolService().ensureAvailable()).rejects.toBeInstanceOf(OptoolNotFoundError);
  });
});

describe("OptoolService.run", () => {
  it("returns the command line and both streams", async () => {
    mockExeca.mockResolvedValueOnce({ stdout: "done", stderr: "note", exitCode: 0 });

    await expect(new OptoolService().run(["E40R.lnk", "-radmc", "-a", "0.3"])).resolves.toEqual({
      command: "optool E40R.lnk -radmc -a 0.3",
      stdout: "done",
      stderr: "note",
    });
    expect(mockExeca).toHaveBeenCalledWith("optool", ["E40R.lnk", "-radmc", "-a", "0.3"], { reject: false });
  });

  it("throws OptoolProcessError on a non-zero exit", async () => {
    mockExeca.mockResolvedValueOnce({ stdout: "partial", stderr: "bad grain size", exitCode: 3 });

    const error = await new OptoolService().run(["E40R.lnk"]).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(OptoolProcessError);
    if (!(error instanceof OptoolProcessError)) return;
    expect(error.message).toBe("Command 'optool E40R.lnk' returned non-zero exit status 3.");
    expect(error.exitCode).toBe(3);
    expect(error.stdout).toBe("partial");
    expect(error.stderr).toBe("bad grain size");
  });

  it("throws OptoolProcessError when the process never started", async () => {
    mockExeca.mockResolvedValueOnce({ stdout: "", stderr: "", exitCode: undefined });

    const error = await new OptoolService("nope").run(["x.lnk"]).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(OptoolProcessError);
    if (!(error instanceof OptoolProcessError)) return;
    expect(error.message).toBe("Failed to start Optool: nope x.lnk");
    expect(error.exitCode).toBeUndefined();
  });
});
