// CHANGE: split an object list file into candidate names
// WHY: one object file name per line, whitespace-trimmed, blank lines kept as literal names
// QUOTE(TZ): "blank lines are NOT filtered by the core"
// REF: req-object-list-1
// SOURCE: n/a
// FORMAT THEOREM: ∀t: parse(t)[i] = trim(line_i(t))
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: a final line terminator does not add an entry
// COMPLEXITY: O(n)

export const parseObjectList = (text: string): ReadonlyArray<string> => {
  const lines = text.split(/\r\n|\r|\n/)
  if (lines.at(-1) === "") {
    lines.pop()
  }
  return lines.map((line) => line.trim())
}
