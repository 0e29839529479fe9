export interface ParsedInput {
  /** Lower-cased first word, or '' for a blank line */
  command: string
  args: string[]
}

export const parseInput = (line: string): ParsedInput => {
  const [first, ...args] = line.trim().split(/\s+/).filter(Boolean)
  return {
    command: first ? first.toLowerCase() : '',
    args,
  }
}
