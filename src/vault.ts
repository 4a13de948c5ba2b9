import fs from "fs/promises";
import path from "path";
import type { NoteLocation, PropertyNote } from "./types";

// Characters Obsidian or the filesystem will not accept in a folder name
const UNSAFE_SEGMENT = /[\\/:*?"<>|#^[\]]/g;

export function sanitizeSegment(segment: string): string {
  const cleaned = segment
    .replace(UNSAFE_SEGMENT, "")
    .replace(/\s+/g, " ")
    .trim();
  return cleaned.replace(/^\.+/, "") || "Unknown";
}

/** <vault>/<province>/<city>/<suburb>/<filename> */
export function notePath(
  vaultPath: string,
  location: NoteLocation,
  filename: string
): string {
  return path.join(
    vaultPath,
    sanitizeSegment(location.province),
    sanitizeSegment(location.city),
    sanitizeSegment(location.suburb),
    filename
  );
}

export async function saveNote(
  note: PropertyNote,
  vaultPath: string
): Promise<string> {
  const filepath = notePath(vaultPath, note.location, note.filename);

  try {
    await fs.mkdir(path.dirname(filepath), { recursive: true });
    await fs.writeFile(filepath, note.content, "utf8");
    console.log(`💾 Note saved: ${filepath}`);
    return filepath;
  } catch (error: unknown) {
    console.error(
      "✗ Failed to save note:",
      error instanceof Error ? error.message : String(error)
    );
    throw error;
  }
}

export async function listNotes(
  vaultPath: string,
  location: Partial<NoteLocation> = {}
): Promise<string[]> {
  const segments = [location.province, location.city, location.suburb]
    .filter((segment): segment is string => Boolean(segment))
    .map(sanitizeSegment);
  const root = path.join(vaultPath, ...segments);

  try {
    return (await walk(root)).sort();
  } catch (error: unknown) {
    if (isNotFound(error)) return [];
    console.error(
      "✗ Failed to list notes:",
      error instanceof Error ? error.message : String(error)
    );
    throw error;
  }
}

async function walk(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(entryPath)));
    } else if (entry.isFile() && entry.name.endsWith(".md")) {
      files.push(entryPath);
    }
  }

  return files;
}

function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}
