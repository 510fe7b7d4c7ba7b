// CHANGE: character source with one-character lookahead and position tracking
// WHY: the parser consumes characters through a narrow contract and owns no buffering
// FORMAT THEOREM: ∀p: p.peek() = c ∧ p.next() = c' → c = c'
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: line() and column() describe the character peek() would return
// COMPLEXITY: O(1) per character

/**
 * Character source consumed by the parser.
 *
 * `undefined` from `peek`/`next` marks the end of the stream.
 */
export interface Producer {
  readonly peek: () => string | undefined
  readonly next: () => string | undefined
  readonly atEnd: () => boolean
  /**
   * `true` switches whitespace skipping on and skips immediately; `false`
   * defers it, so whitespace is delivered verbatim until switched back on.
   */
  readonly skipWhitespace: (consumeTrailing: boolean) => void
  readonly line: () => number
  readonly column: () => number
}

export const isWhitespace = (char: string): boolean =>
  char === " " || char === "\t" || char === "\n" || char === "\r"

/**
 * Build a producer over an in-memory string.
 *
 * @param text - Source text; iterated by code point.
 * @returns Producer starting at 1:1 with whitespace skipping off.
 *
 * @pure false
 * @effect mutates its own cursor only
 * @invariant offset never exceeds text.length
 * @complexity O(1) per call
 */
export const makeTextProducer = (text: string): Producer => {
  let offset = 0
  let line = 1
  let column = 1
  let skipping = false

  const current = (): string | undefined => {
    const code = text.codePointAt(offset)
    return code === undefined ? undefined : String.fromCodePoint(code)
  }

  const advance = (): string | undefined => {
    const char = current()
    if (char === undefined) {
      return undefined
    }
    offset += char.length
    if (char === "\n") {
      line++
      column = 1
    } else {
      column++
    }
    return char
  }

  const settle = (): void => {
    if (!skipping) {
      return
    }
    for (let char = current(); char !== undefined && isWhitespace(char); char = current()) {
      advance()
    }
  }

  return {
    peek: () => {
      settle()
      return current()
    },
    next: () => {
      settle()
      return advance()
    },
    atEnd: () => {
      settle()
      return offset >= text.length
    },
    skipWhitespace: (consumeTrailing) => {
      skipping = consumeTrailing
      settle()
    },
    line: () => {
      settle()
      return line
    },
    column: () => {
      settle()
      return column
    }
  }
}
