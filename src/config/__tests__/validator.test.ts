import { describe, expect, it } from "vitest"
import { validateYAML } from "../validator"
import { isCppforgeError, type CppforgeError } from "../../utils/errors"

const captureValidationError = (fn: () => unknown): CppforgeError => {
  try {
    fn()
  } catch (error) {
    if (isCppforgeError(error)) {
      expect(error.name).toBe("ValidationError")
      return error
    }
    throw error
  }

  throw new Error("Expected ValidationError to be thrown")
}

describe("validateYAML", () => {
  it("maps both sections onto the tool config", () => {
    const yaml = `
cmake:
  presets_path: cmake/CMakePresets.json
  default_generator: Unix Makefiles
docker:
  docker_compose_file: compose.yaml
  default_container_name: toolchain
  service: builder
`
    expect(validateYAML(yaml)).toEqual({
      presetsPath: "cmake/CMakePresets.json",
      defaultGenerator: "Unix Makefiles",
      dockerComposeFile: "compose.yaml",
      defaultContainerName: "toolchain",
      dockerService: "builder",
    })
  })

  it("fills missing keys with defaults", () => {
    expect(validateYAML("docker:\n  default_container_name: box\n")).toEqual({
      presetsPath: "CMakePresets.json",
      defaultGenerator: "Ninja",
      dockerComposeFile: "docker-compose.yml",
      defaultContainerName: "box",
      dockerService: "dev",
    })
  })

  it("treats an empty document as defaults", () => {
    expect(validateYAML("").defaultGenerator).toBe("Ninja")
  })

  it("rejects malformed YAML", () => {
    const error = captureValidationError(() => validateYAML("cmake: [unterminated"))

    expect(error.code).toBe("CONFIG_PARSE_ERROR")
    expect(error.message).toBe("Failed to parse YAML")
  })

  it("rejects a non-mapping document", () => {
    const error = captureValidationError(() => validateYAML("- a\n- b\n"))

    expect(error.message).toBe("Configuration must be a YAML mapping")
    expect(error.details).toEqual({ received: "array" })
  })

  it("reports wrong value types with their path", () => {
    const error = captureValidationError(() => validateYAML("cmake:\n  default_generator: 42\n"))

    expect(error.message).toBe("cmake.default_generator must be a string")
    expect(error.details.issues).toEqual([
      { path: "cmake.default_generator", message: "cmake.default_generator must be a string", code: "invalid_type" },
    ])
  })

  it("rejects empty strings", () => {
    const error = captureValidationError(() => validateYAML('docker:\n  docker_compose_file: ""\n'))

    expect(error.message).toBe("docker.docker_compose_file must not be empty")
  })

  it("rejects unknown sections", () => {
    const error = captureValidationError(() => validateYAML("build:\n  jobs: 4\n"))

    expect(error.message).toBe("Unknown key: build")
  })
})
