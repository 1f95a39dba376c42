import fs from "node:fs";

// Yields the lines of a UTF-8 file without holding the whole file in memory.
// "\r\n", "\n" and a lone "\r" all end a line. Invalid UTF-8 throws, like any
// other read failure.
export async function* readLines(
  path: string,
  chunk = 64 * 1024
): AsyncGenerator<string> {
  const decoder = new TextDecoder("utf-8", { fatal: true });
  const fd = await fs.promises.open(path, "r");
  const buf = Buffer.allocUnsafe(chunk);
  let pending = "";
  try {
    let pos = 0;
    while (true) {
      const { bytesRead } = await fd.read(buf, 0, buf.length, pos);
      if (bytesRead <= 0) break;
      pending += decoder.decode(buf.subarray(0, bytesRead), { stream: true });
      pos += bytesRead;

      const { lines, rest } = takeLines(pending, false);
      yield* lines;
      pending = rest;
    }
    pending += decoder.decode();
    const { lines, rest } = takeLines(pending, true);
    yield* lines;
    if (rest.length > 0) yield rest;
  } finally {
    await fd.close();
  }
}

export function takeLines(
  text: string,
  final: boolean
): { lines: string[]; rest: string } {
  const lines: string[] = [];
  const re = /\r\n|\r|\n/g;
  let start = 0;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    // a "\r" at the end of a chunk may be the first half of "\r\n"
    if (!final && m[0] === "\r" && m.index === text.length - 1) break;
    lines.push(text.slice(start, m.index));
    start = m.index + m[0].length;
  }
  return { lines, rest: text.slice(start) };
}
