import fs from "node:fs";
import os from "node:os";
import path from "node:path";

// 4 tokens: user, Hi, assistant, Hello!
export const PERFECT =
  '{"messages":[{"role":"user","content":"Hi"},{"role":"assistant","content":"Hello!"}]}';

// 15 tokens with the default ratio, 12 words
export const LONGER = JSON.stringify({
  messages: [
    { role: "system", content: "You are helpful." },
    { role: "user", content: "Hello, world! How are you?" },
    { role: "assistant", content: "Fine" },
  ],
});

export function makeTmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "dataset-validator-"));
}

export function writeDataset(
  dir: string,
  content: string | Buffer,
  name = "data.jsonl"
): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, content);
  return file;
}
