const SAFE_ARGUMENT = /^[\w@%+=:,./-]+$/

const quoteArgument = (argument: string): string => {
  if (argument.length === 0) {
    return "''"
  }
  if (SAFE_ARGUMENT.test(argument)) {
    return argument
  }
  return `'${argument.replace(/'/g, `'\\''`)}'`
}

/**
 * Renders a process invocation as a copy-pasteable shell command line.
 */
export const formatCommand = (file: string, args: ReadonlyArray<string>): string => {
  return [file, ...args].map(quoteArgument).join(" ")
}
