/**
 * Note Storage
 *
 * File operations for reading and writing learning notes.
 * Notes are stored as markdown files with YAML frontmatter:
 *
 * ```markdown
 * ---
 * title: "Python GIL"
 * created: "2026-01-23T09:00:00.000Z"
 * review_mode: "spaced"
 * ...other header fields...
 * ---
 * Free-text body...
 * ```
 *
 * Writes go through a temp file so an interrupted write never leaves a
 * truncated or empty note, and writes to one filename are chained so they
 * never interleave.
 */

import { readFile, mkdir, readdir } from "node:fs/promises";
import { join } from "node:path";
import { parseDocument, stringify as stringifyYaml, isMap } from "yaml";
import { isEqual } from "lodash-es";
import {
  type Note,
  type NoteHeader,
  NoteHeaderSchema,
  HEADER_FIELDS,
  NOTE_EXTENSION,
  README_FILENAME,
  checkFilename,
  noteStem,
} from "./note-schema.js";
import {
  MalformedHeaderError,
  NoteNotFoundError,
  PersistenceError,
  ValidationError,
  errnoCode,
} from "../errors.js";
import { storeLog as log } from "../logger.js";
import { atomicWrite, writeExclusive } from "../atomic-file.js";

// =============================================================================
// Constants
// =============================================================================

/**
 * Frontmatter block followed by the body. The body is everything after the
 * closing delimiter line.
 */
const FRONTMATTER_PATTERN = /^---\r?\n([\s\S]*?)\r?\n---(?:\r?\n|$)([\s\S]*)$/;

/**
 * YAML output options shared by fresh serialization and in-place edits.
 */
const YAML_OPTIONS = {
  // Quote strings so timestamps stay strings for other YAML readers
  defaultStringType: "QUOTE_DOUBLE",
  defaultKeyType: "PLAIN",
  // Never fold long reasons or titles across lines
  lineWidth: 0,
} as const;

/** Maximum attempts at finding a free filename for a new note */
const MAX_FILENAME_ATTEMPTS = 1000;

// =============================================================================
// Parsing
// =============================================================================

interface ParsedNoteFile {
  note: Note;
  document: ReturnType<typeof parseDocument>;
}

/**
 * Split raw file content into its YAML text and body.
 *
 * @throws MalformedHeaderError if no frontmatter block is present
 */
function splitFrontmatter(filename: string, content: string): { yamlText: string; body: string } {
  const match = content.match(FRONTMATTER_PATTERN);
  if (!match) {
    throw new MalformedHeaderError(filename, "No YAML frontmatter found");
  }
  const [, yamlText, body] = match;
  return { yamlText, body };
}

/**
 * Parse and validate a header object taken from YAML.
 *
 * @throws MalformedHeaderError naming the first offending field
 */
export function parseNoteHeader(filename: string, raw: unknown): NoteHeader {
  const result = NoteHeaderSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.length > 0 ? issue.path.join(".") : undefined;
    throw new MalformedHeaderError(filename, issue.message, field);
  }
  return result.data;
}

function parseNoteDocument(filename: string, content: string): ParsedNoteFile {
  const { yamlText, body } = splitFrontmatter(filename, content);

  const document = parseDocument(yamlText);
  if (document.errors.length > 0) {
    throw new MalformedHeaderError(filename, `Invalid YAML: ${document.errors[0].message}`);
  }
  if (!isMap(document.contents)) {
    throw new MalformedHeaderError(filename, "Frontmatter must be a key/value map");
  }

  const header = parseNoteHeader(filename, document.toJS());
  return { note: { filename, header, body }, document };
}

/**
 * Parse a note file's content.
 *
 * @param filename - Note filename, used for the note identity and errors
 * @param content - Raw markdown content of the note file
 * @throws MalformedHeaderError if the frontmatter is missing or invalid
 */
export function parseNoteFile(filename: string, content: string): Note {
  return parseNoteDocument(filename, content).note;
}

// =============================================================================
// Serialization
// =============================================================================

/**
 * Serialize a note to markdown file content.
 *
 * Header fields are written in a fixed order so freshly written notes
 * are stable across saves.
 */
export function serializeNote(note: Note): string {
  const header: Record<string, unknown> = {};
  for (const field of HEADER_FIELDS) {
    header[field] = note.header[field];
  }
  const yamlText = stringifyYaml(header, YAML_OPTIONS);
  return `---\n${yamlText}---\n${note.body}`;
}

/**
 * Apply a note's header and body onto the content currently on disk.
 *
 * Only fields whose values differ are replaced in the existing YAML
 * document, so untouched fields keep their original formatting.
 *
 * @returns New content, or null when nothing differs
 * @throws MalformedHeaderError if the current content is not a valid note
 */
export function applyNoteChanges(currentContent: string, note: Note): string | null {
  const { note: current, document } = parseNoteDocument(note.filename, currentContent);

  const changed = HEADER_FIELDS.filter(
    (field) => !isEqual(current.header[field], note.header[field])
  );
  if (changed.length === 0 && current.body === note.body) {
    return null;
  }

  for (const field of changed) {
    document.set(field, document.createNode(note.header[field]));
  }

  return `---\n${document.toString(YAML_OPTIONS)}---\n${note.body}`;
}

// =============================================================================
// Note Store
// =============================================================================

/**
 * Result of loading every note in the notes directory.
 */
export interface LoadAllResult {
  /** Valid notes, in directory order */
  notes: Note[];
  /** Notes whose headers failed to parse; left untouched on disk */
  quarantined: Array<{ filename: string; error: string }>;
}

/**
 * Durable store for notes in a single directory.
 */
export class NoteStore {
  readonly notesDir: string;

  /** Tail of the write chain for each filename */
  private writeChains = new Map<string, Promise<void>>();

  constructor(notesDir: string) {
    this.notesDir = notesDir;
  }

  /**
   * Absolute path of a note file.
   *
   * @throws ValidationError if the filename is unsafe
   */
  getNotePath(filename: string): string {
    const problem = checkFilename(filename);
    if (problem) {
      throw new ValidationError(problem);
    }
    return join(this.notesDir, filename);
  }

  /**
   * Ensure the notes directory exists.
   */
  async ensureNotesDir(): Promise<void> {
    try {
      await mkdir(this.notesDir, { recursive: true });
    } catch (e) {
      throw new PersistenceError("create directory", this.notesDir, e);
    }
  }

  /**
   * Read and parse a note.
   *
   * @throws NoteNotFoundError if no such note exists
   * @throws MalformedHeaderError if its header is corrupt
   * @throws PersistenceError if the file cannot be read
   */
  async load(filename: string): Promise<Note> {
    const path = this.getNotePath(filename);
    const content = await this.readIfExists(path);
    if (content === null) {
      throw new NoteNotFoundError(filename);
    }
    return parseNoteFile(filename, content);
  }

  /**
   * Check whether a note file exists.
   */
  async exists(filename: string): Promise<boolean> {
    const content = await this.readIfExists(this.getNotePath(filename));
    return content !== null;
  }

  /**
   * Persist a note.
   *
   * A new note is written in canonical form. An existing note has only
   * its changed fields rewritten, and is not touched at all if nothing
   * changed. Saving over a corrupt note fails instead of replacing it.
   *
   * @throws MalformedHeaderError if the file on disk is corrupt
   * @throws PersistenceError if the write fails
   */
  async save(note: Note): Promise<void> {
    const path = this.getNotePath(note.filename);

    await this.exclusive(note.filename, async () => {
      const existing = await this.readIfExists(path);
      const content = existing === null ? serializeNote(note) : applyNoteChanges(existing, note);

      if (content === null) {
        log.debug(`No changes to write for ${note.filename}`);
        return;
      }

      try {
        await atomicWrite(path, content);
      } catch (e) {
        throw new PersistenceError("write", path, e);
      }
      log.debug(`Wrote note ${note.filename}`);
    });
  }

  /**
   * Write a new note under a free filename derived from `baseFilename`.
   *
   * The complete note is linked into place under a name nobody holds yet,
   * trying `base-1.md`, `base-2.md`, ... on collision. A failed write
   * leaves no file behind.
   *
   * @returns The note as written, with its final filename
   */
  async create(baseFilename: string, header: NoteHeader, body: string): Promise<Note> {
    this.getNotePath(baseFilename);
    await this.ensureNotesDir();

    const stem = noteStem(baseFilename);
    for (let attempt = 0; attempt < MAX_FILENAME_ATTEMPTS; attempt++) {
      const filename = attempt === 0 ? baseFilename : `${stem}-${attempt}${NOTE_EXTENSION}`;
      const path = join(this.notesDir, filename);

      const note: Note = { filename, header, body };
      const created = await this.exclusive(filename, () => this.writeNew(path, serializeNote(note)));
      if (!created) {
        continue;
      }

      log.info(`Created note ${filename}`);
      return note;
    }

    throw new PersistenceError(
      "create note",
      join(this.notesDir, baseFilename),
      new Error(`No free filename after ${MAX_FILENAME_ATTEMPTS} attempts`)
    );
  }

  /**
   * List note filenames (every .md file except README.md).
   */
  async list(): Promise<string[]> {
    try {
      const entries = await readdir(this.notesDir, { withFileTypes: true });
      return entries
        .filter(
          (entry) =>
            entry.isFile() &&
            entry.name.endsWith(NOTE_EXTENSION) &&
            entry.name !== README_FILENAME &&
            !entry.name.startsWith(".")
        )
        .map((entry) => entry.name)
        .sort();
    } catch (e) {
      if (errnoCode(e) === "ENOENT") {
        // Notes directory doesn't exist yet
        return [];
      }
      throw new PersistenceError("list", this.notesDir, e);
    }
  }

  /**
   * Load every note. Notes with corrupt headers are quarantined: reported
   * and logged, never rewritten.
   */
  async loadAll(): Promise<LoadAllResult> {
    const filenames = await this.list();
    const result: LoadAllResult = { notes: [], quarantined: [] };

    for (const filename of filenames) {
      try {
        result.notes.push(await this.load(filename));
      } catch (e) {
        if (e instanceof MalformedHeaderError || e instanceof ValidationError) {
          log.warn(`Quarantined note ${filename}: ${e.message}`);
          result.quarantined.push({ filename, error: e.message });
          continue;
        }
        if (e instanceof NoteNotFoundError) {
          // Removed between listing and reading
          continue;
        }
        throw e;
      }
    }

    return result;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  /**
   * Run `task` after every earlier task for the same filename has settled.
   */
  private exclusive<T>(filename: string, task: () => Promise<T>): Promise<T> {
    const previous = this.writeChains.get(filename) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.writeChains.set(filename, tail);
    void tail.then(() => {
      if (this.writeChains.get(filename) === tail) {
        this.writeChains.delete(filename);
      }
    });
    return run;
  }

  private async readIfExists(path: string): Promise<string | null> {
    try {
      return await readFile(path, "utf-8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") {
        return null;
      }
      throw new PersistenceError("read", path, e);
    }
  }

  /**
   * Write `content` to `path` unless a file already exists there.
   *
   * @returns true if this call created the file
   */
  private async writeNew(path: string, content: string): Promise<boolean> {
    try {
      return await writeExclusive(path, content);
    } catch (e) {
      throw new PersistenceError("create", path, e);
    }
  }
}
