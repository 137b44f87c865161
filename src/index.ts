#!/usr/bin/env node
import { createCli } from "./cli/index"

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const cli = createCli()
  try {
    const exitCode = await cli.run(process.argv.slice(2))
    process.exitCode = exitCode
  } catch (error) {
    if (error instanceof Error) {
      console.error("Error:", error.message)

      if (process.env.CPPFORGE_DEBUG === "true") {
        console.error(error.stack)
      }
    } else {
      console.error("An unexpected error occurred:", String(error))
    }

    process.exit(1)
  }
}

void main()
