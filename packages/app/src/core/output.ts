// PURITY: CORE
// INVARIANT: writes are appended in call order; a sink is never read back by the renderer

export interface Output {
  readonly write: (text: string) => void
}

export interface StringOutput extends Output {
  readonly contents: () => string
}

export const makeStringOutput = (): StringOutput => {
  const chunks: Array<string> = []
  return {
    write: (text) => {
      chunks.push(text)
    },
    contents: () => chunks.join("")
  }
}
