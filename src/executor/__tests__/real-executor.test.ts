import { afterEach, beforeEach, describe, expect, it, vi } from "vitest"

vi.mock("execa", () => ({
  execa: vi.fn(),
}))

import { execa } from "execa"
import { createRealExecutor } from "../real-executor"

const execaMock = vi.mocked(execa)

const invocation = {
  file: "cmake",
  args: ["--build", "/work/project/build"],
  cwd: "/work/project",
  env: { PATH: "/usr/bin" },
}

describe("createRealExecutor", () => {
  beforeEach(() => {
    execaMock.mockReset()
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("runs the invocation with inherited stdio and its own environment", async () => {
    execaMock.mockResolvedValue({ exitCode: 0 } as never)
    const executor = createRealExecutor()

    const status = await executor.execute(invocation)

    expect(status).toBe(0)
    expect(execaMock).toHaveBeenCalledWith("cmake", ["--build", "/work/project/build"], {
      cwd: "/work/project",
      env: { PATH: "/usr/bin" },
      extendEnv: false,
      stdio: "inherit",
    })
  })

  it("returns the exit status of a failing process", async () => {
    execaMock.mockRejectedValue({ exitCode: 2, message: "Command failed with exit code 2" } as never)
    const executor = createRealExecutor()

    await expect(executor.execute(invocation)).resolves.toBe(2)
  })

  it("maps a terminating signal to 128 plus its number", async () => {
    execaMock.mockRejectedValue({ signal: "SIGINT", message: "Command was killed with SIGINT" } as never)
    const executor = createRealExecutor()

    await expect(executor.execute(invocation)).resolves.toBe(130)
  })

  it("raises a launch failure when the process cannot start", async () => {
    execaMock.mockRejectedValue(Object.assign(new Error("spawn cmake ENOENT"), { code: "ENOENT" }) as never)
    const executor = createRealExecutor()

    await expect(executor.execute(invocation)).rejects.toMatchObject({
      kind: "execution",
      code: "LAUNCH_FAILURE",
      message: "Failed to launch cmake: spawn cmake ENOENT",
      path: "cmake",
      details: { command: "cmake --build /work/project/build", cwd: "/work/project" },
    })
  })

  it("removes its interrupt handler after the process exits", async () => {
    execaMock.mockResolvedValue({ exitCode: 0 } as never)
    const before = process.listenerCount("SIGINT")
    const executor = createRealExecutor()

    await executor.execute(invocation)

    expect(process.listenerCount("SIGINT")).toBe(before)
  })

  it("forwards an interrupt to the running child and reports its signal status", async () => {
    let rejectChild: (reason: unknown) => void = () => {}
    const pending = new Promise<never>((_resolve, reject) => {
      rejectChild = reject
    })
    const kill = vi.fn((signal: string) => {
      rejectChild({ signal, message: `Command was killed with ${signal}` })
      return true
    })
    execaMock.mockReturnValue(Object.assign(pending, { kill }) as never)
    const existing = process.listeners("SIGINT")
    const executor = createRealExecutor()

    const status = executor.execute(invocation)
    const added = process.listeners("SIGINT").filter((listener) => !existing.includes(listener))
    expect(added).toHaveLength(1)
    added.forEach((listener) => listener("SIGINT"))

    await expect(status).resolves.toBe(130)
    expect(kill).toHaveBeenCalledWith("SIGINT")
    expect(process.listeners("SIGINT")).toEqual(existing)
  })

  it("reports non-dry-run behavior and logs each command when verbose", async () => {
    execaMock.mockResolvedValue({ exitCode: 0 } as never)
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {})
    const executor = createRealExecutor({ verbose: true })

    expect(executor.isDryRun()).toBe(false)
    await executor.execute(invocation)

    expect(logSpy).toHaveBeenCalledWith("[exec] Executing: cmake --build /work/project/build")
  })
})
