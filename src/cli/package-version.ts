type RequireLike = (id: string) => unknown

// Source runs from src/cli, the bundle from dist
const PACKAGE_JSON_CANDIDATES = ["../package.json", "../../package.json"] as const

const isModuleNotFound = (error: unknown): boolean => {
  return error instanceof Error && "code" in error && error.code === "MODULE_NOT_FOUND"
}

const readVersion = (value: unknown): string => {
  if (typeof value === "object" && value !== null && "version" in value && typeof value.version === "string") {
    return value.version
  }
  return "0.0.0"
}

export const loadPackageVersion = (requireFn: RequireLike): string => {
  let lastError: unknown
  for (const candidate of PACKAGE_JSON_CANDIDATES) {
    try {
      return readVersion(requireFn(candidate))
    } catch (error) {
      if (!isModuleNotFound(error)) {
        throw error
      }
      lastError = error
    }
  }
  throw lastError
}
