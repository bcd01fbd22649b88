import { readFile, readdir, realpath, stat } from "node:fs/promises";
import { extname, isAbsolute, relative, resolve, sep } from "node:path";

export interface FileContent {
  /** Path relative to the reader's base directory, with forward slashes. */
  path: string;
  content: string;
  language: string;
  lineCount: number;
  truncated: boolean;
}

/** The part of the reader the audit step depends on. */
export interface CodeFiles {
  findFiles(patterns: readonly string[]): Promise<string[]>;
  readFile(path: string): Promise<FileContent>;
}

const LANGUAGES: Record<string, string> = {
  ".py": "python",
  ".js": "javascript",
  ".jsx": "javascript",
  ".ts": "typescript",
  ".tsx": "typescript",
  ".java": "java",
  ".go": "go",
  ".rs": "rust",
  ".cpp": "cpp",
  ".c": "c",
  ".h": "c",
  ".yaml": "yaml",
  ".yml": "yaml",
  ".json": "json",
  ".toml": "toml",
  ".md": "markdown",
  ".html": "html",
  ".css": "css",
  ".scss": "scss",
  ".sql": "sql",
  ".sh": "bash",
  ".bash": "bash",
  ".zsh": "bash",
  ".dockerfile": "dockerfile",
  ".containerfile": "dockerfile"
};

export const ALLOWED_EXTENSIONS: readonly string[] = [...Object.keys(LANGUAGES), ".txt", ".rst"];

export const BLOCKED_PATTERNS: readonly string[] = [
  ".env",
  "secrets",
  "credentials",
  "password",
  ".pem",
  ".key",
  ".crt",
  ".pfx",
  "id_rsa",
  "id_ed25519",
  ".aws/credentials"
];

export const DEFAULT_EXCLUDED_DIRS: readonly string[] = ["node_modules", ".git", "__pycache__", "venv", ".venv", "dist"];

export type FileAccessErrorCode = "OUTSIDE_WORKSPACE" | "BLOCKED" | "EXTENSION_NOT_ALLOWED" | "NOT_FOUND";

export class FileAccessError extends Error {
  constructor(
    message: string,
    readonly code: FileAccessErrorCode
  ) {
    super(message);
    this.name = "FileAccessError";
  }
}

export interface FileReaderOptions {
  baseDir: string;
  maxLines?: number;
  allowedExtensions?: readonly string[];
  /** Upper bound on files visited by one search. */
  maxScannedFiles?: number;
}

function toPosix(path: string): string {
  return path.split(sep).join("/");
}

function isInside(baseDir: string, target: string): boolean {
  const rel = relative(baseDir, target);
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

function globToRegExp(pattern: string): RegExp {
  const source = pattern
    .split("")
    .map((char) => {
      if (char === "*") {
        return "[^/]*";
      }
      if (char === "?") {
        return "[^/]";
      }
      return char.replace(/[\\^$.|+()[\]{}]/g, "\\$&");
    })
    .join("");
  return new RegExp(`^${source}$`, "i");
}

export function detectLanguage(path: string): string {
  return LANGUAGES[extname(path).toLowerCase()] ?? "text";
}

/**
 * Read-only access to source files under a base directory. Paths that leave the
 * directory, match a blocked pattern or carry an unlisted extension are refused.
 */
export class FileReader implements CodeFiles {
  readonly baseDir: string;
  private readonly maxLines: number;
  private readonly allowedExtensions: ReadonlySet<string>;
  private readonly maxScannedFiles: number;

  constructor(options: FileReaderOptions) {
    this.baseDir = resolve(options.baseDir);
    this.maxLines = options.maxLines ?? 500;
    this.allowedExtensions = new Set((options.allowedExtensions ?? ALLOWED_EXTENSIONS).map((ext) => ext.toLowerCase()));
    this.maxScannedFiles = options.maxScannedFiles ?? 20_000;
  }

  /** Resolves `path` against the base directory, throwing when it may not be read. */
  resolveSafe(path: string): string {
    const target = resolve(this.baseDir, path);
    if (!isInside(this.baseDir, target)) {
      throw new FileAccessError(`Access denied: ${path} is outside the workspace`, "OUTSIDE_WORKSPACE");
    }
    const rel = toPosix(relative(this.baseDir, target)).toLowerCase();
    if (BLOCKED_PATTERNS.some((pattern) => rel.includes(pattern))) {
      throw new FileAccessError(`Access denied: ${path} is blocked`, "BLOCKED");
    }
    return target;
  }

  isSafePath(path: string): boolean {
    try {
      this.resolveSafe(path);
      return true;
    } catch (error) {
      if (error instanceof FileAccessError) {
        return false;
      }
      throw error;
    }
  }

  async readFile(path: string): Promise<FileContent> {
    const target = this.resolveSafe(path);
    const extension = extname(target).toLowerCase();
    if (!this.allowedExtensions.has(extension)) {
      throw new FileAccessError(`File type not allowed: ${extension || "(none)"}`, "EXTENSION_NOT_ALLOWED");
    }

    let real: string;
    try {
      real = await realpath(target);
    } catch {
      throw new FileAccessError(`File not found: ${path}`, "NOT_FOUND");
    }
    // A symlink inside the workspace may point outside it.
    if (!isInside(await realpath(this.baseDir), real)) {
      throw new FileAccessError(`Access denied: ${path} resolves outside the workspace`, "OUTSIDE_WORKSPACE");
    }
    if (!(await stat(real)).isFile()) {
      throw new FileAccessError(`File not found: ${path}`, "NOT_FOUND");
    }

    const lines = (await readFile(real, "utf8")).split("\n");
    const truncated = lines.length > this.maxLines;
    const kept = truncated ? lines.slice(0, this.maxLines) : lines;
    const content = truncated ? `${kept.join("\n")}\n... [Truncated at ${this.maxLines} lines] ...` : kept.join("\n");

    return {
      path: toPosix(relative(this.baseDir, target)),
      content,
      language: detectLanguage(target),
      lineCount: kept.length,
      truncated
    };
  }

  /**
   * Finds readable files whose name matches one of the glob patterns (`*` and `?`).
   * A pattern containing `/` is matched against the end of the relative path.
   */
  async findFiles(patterns: readonly string[], excludeDirs: readonly string[] = DEFAULT_EXCLUDED_DIRS): Promise<string[]> {
    const matchers = patterns
      .map((pattern) => pattern.trim())
      .filter((pattern) => pattern.length > 0)
      .map((pattern) => ({ byPath: pattern.includes("/"), regex: globToRegExp(pattern.replace(/^\/+/, "")) }));
    if (matchers.length === 0) {
      return [];
    }

    const excluded = new Set(excludeDirs);
    const matches = new Set<string>();
    const pending = [this.baseDir];
    let scanned = 0;

    while (pending.length > 0 && scanned < this.maxScannedFiles) {
      const dir = pending.pop() ?? this.baseDir;
      const entries = await readdir(dir, { withFileTypes: true });
      for (const entry of entries) {
        const full = resolve(dir, entry.name);
        if (entry.isDirectory()) {
          if (!excluded.has(entry.name)) {
            pending.push(full);
          }
          continue;
        }
        if (!entry.isFile()) {
          continue;
        }
        scanned += 1;
        const rel = toPosix(relative(this.baseDir, full));
        const hit = matchers.some(({ byPath, regex }) =>
          byPath ? rel.split("/").some((_, index, parts) => regex.test(parts.slice(index).join("/"))) : regex.test(entry.name)
        );
        if (hit && this.isSafePath(rel)) {
          matches.add(rel);
        }
      }
    }

    return [...matches].sort((a, b) => a.localeCompare(b));
  }
}

export function formatFileContent(file: FileContent): string {
  return [
    `--- File: ${file.path} ---`,
    `Language: ${file.language}`,
    `Lines: ${file.lineCount}${file.truncated ? " (truncated)" : ""}`,
    "",
    `\`\`\`${file.language}`,
    file.content,
    "```"
  ].join("\n");
}
