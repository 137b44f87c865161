import fs from "fs-extra"
import os from "os"
import path from "path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { parseProjectName, resolveProjectExecutable } from "./project-executable"

describe("parseProjectName", () => {
  it("reads the first project command", () => {
    const text = ["cmake_minimum_required(VERSION 3.20)", "# project(commented)", "project(demo VERSION 1.0 LANGUAGES CXX)"].join(
      "\n",
    )

    expect(parseProjectName(text)).toBe("demo")
  })

  it("accepts upper case, spacing and quoted names", () => {
    expect(parseProjectName('  PROJECT ( "engine" CXX)')).toBe("engine")
  })

  it("keeps only the first path segment", () => {
    expect(parseProjectName("project(tool/sub)")).toBe("tool")
  })

  it("returns undefined without a project command", () => {
    expect(parseProjectName("add_executable(app main.cpp)")).toBeUndefined()
  })
})

describe("resolveProjectExecutable", () => {
  let tempDir: string

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "cppforge-project-"))
  })

  afterEach(async () => {
    await fs.remove(tempDir)
  })

  it("joins the project name onto the binary directory", async () => {
    const cmakeListsPath = path.join(tempDir, "CMakeLists.txt")
    await fs.writeFile(cmakeListsPath, "project(demo)\n")

    await expect(
      resolveProjectExecutable({ binaryDir: path.join(tempDir, "build"), cmakeListsPath }),
    ).resolves.toBe(path.join(tempDir, "build", "demo"))
  })

  it("fails when CMakeLists.txt is missing", async () => {
    await expect(
      resolveProjectExecutable({ binaryDir: tempDir, cmakeListsPath: path.join(tempDir, "CMakeLists.txt") }),
    ).rejects.toMatchObject({ kind: "execution", code: "PRECONDITION_FAILED", path: "run" })
  })

  it("fails when no project is declared", async () => {
    const cmakeListsPath = path.join(tempDir, "CMakeLists.txt")
    await fs.writeFile(cmakeListsPath, "add_executable(app main.cpp)\n")

    await expect(resolveProjectExecutable({ binaryDir: tempDir, cmakeListsPath })).rejects.toMatchObject({
      code: "PRECONDITION_FAILED",
      message: `Could not find a project() name in ${cmakeListsPath}`,
    })
  })
})
