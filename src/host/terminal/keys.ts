const ESC = '\u001b'

const SEQUENCES: ReadonlyArray<[string, string]> = [
  [`${ESC}OP`, 'f1'],
  [`${ESC}OQ`, 'f2'],
  [`${ESC}OR`, 'f3'],
  [`${ESC}[11~`, 'f1'],
  [`${ESC}[12~`, 'f2'],
  [`${ESC}[13~`, 'f3'],
  [`${ESC}[15~`, 'f5'],
]

// Splits one chunk of raw-mode stdin into key names. Unknown escape sequences
// are dropped whole; printable characters come back lowercased.
export function parseKeyNames(data: string): string[] {
  const out: string[] = []
  let i = 0
  while (i < data.length) {
    const ch = data[i]
    if (ch === '\u0003') { out.push('ctrl-c'); i++; continue }
    if (ch === ESC) {
      const seq = SEQUENCES.find(([s]) => data.startsWith(s, i))
      if (seq) { out.push(seq[1]); i += seq[0].length; continue }
      const next = data[i + 1]
      if (next === '[' || next === 'O') {
        // CSI / SS3 we don't map: skip to the final byte.
        let j = i + 2
        while (j < data.length && !/[A-Za-z~]/.test(data[j])) j++
        i = j + 1
        continue
      }
      out.push('escape')
      i++
      continue
    }
    if (ch >= ' ' && ch !== '\u007f') out.push(ch.toLowerCase())
    i++
  }
  return out
}
