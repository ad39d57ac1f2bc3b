import * as fs from "fs";
import * as path from "path";

export type OutputEntry = {
  videoId: string;
  content: string;
};

export type OutputOptions = {
  /** Single file receiving every entry. */
  output?: string;
  /** Directory receiving `<videoId>.<extension>` per entry. */
  outputDir?: string;
  extension: string;
  write?: (text: string) => void;
};

const withTrailingNewline = (content: string): string => {
  return content === "" || content.endsWith("\n") ? content : `${content}\n`;
};

/** Entries joined with a blank line between them. */
export function joinEntries(entries: readonly OutputEntry[]): string {
  return entries.map((entry) => withTrailingNewline(entry.content)).join("\n");
}

function writeFile(filePath: string, content: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, "utf-8");
}

/** Writes entries to stdout, one file or one file per video. Returns the paths written. */
export function writeOutput(entries: readonly OutputEntry[], options: OutputOptions): string[] {
  if (options.outputDir) {
    const written: string[] = [];
    for (const entry of entries) {
      const filePath = path.join(options.outputDir, `${entry.videoId}.${options.extension}`);
      writeFile(filePath, withTrailingNewline(entry.content));
      written.push(filePath);
    }
    return written;
  }

  if (options.output) {
    writeFile(options.output, joinEntries(entries));
    return [options.output];
  }

  const write = options.write ?? ((text: string) => {
    process.stdout.write(text);
  });
  write(joinEntries(entries));
  return [];
}
