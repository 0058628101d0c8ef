import { beforeEach, describe, expect, it, vi } from "vitest";

import { emulate } from "../index";

const { runProgramMock } = vi.hoisted(() => ({
  runProgramMock: vi.fn(),
}));

vi.mock("@/arm64-engine", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/arm64-engine")>();
  return { ...actual, runProgram: runProgramMock };
});

describe("emulator emulate (runProgram をモック)", () => {
  beforeEach(() => {
    runProgramMock.mockReset();
  });

  it("既定値を埋めたオプションと SP の初期値を渡す", () => {
    runProgramMock.mockReturnValue({ status: "finished", steps: 0 });

    const result = emulate("NOP", { stackBase: 0x40n });

    expect(runProgramMock).toHaveBeenCalledWith(
      expect.objectContaining({ instructions: expect.any(Array) }),
      expect.objectContaining({ maxSteps: 100_000, initialSp: 0x40n }),
    );
    expect(result.status).toBe("finished");
  });

  it("想定外の例外は InternalError として返す", () => {
    runProgramMock.mockImplementation(() => {
      throw new TypeError("boom");
    });

    const result = emulate("NOP");

    expect(result.status).toBe("error");
    expect(result.error?.type).toBe("InternalError");
    expect(result.error?.message).toBe("boom");
    expect(result.instructionCount).toBe(1);
  });
});
