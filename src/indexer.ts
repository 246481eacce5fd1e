import fs from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { Metadata } from "./types";

/** Sink for ingested chunks (normally the retrieval service). */
export interface IngestTarget {
  ingest(texts: readonly string[], metadata?: Metadata): Promise<string[]>;
}

/**
 * Options required to construct a {@link FileIngestor}. All fields are mandatory
 * except `verbose` which enables per-file progress logging.
 */
export interface FileIngestorOptions {
  root: string; // directory every ingested path must stay within
  allowedExt: string[]; // list of file extensions WITHOUT leading dot
  excludedFolders: string[]; // folder names pruned during discovery
  target: IngestTarget;
  chunkSize?: number; // optional override (default 800)
  chunkOverlap?: number; // optional override (default 120)
  verbose?: boolean;
}

export interface FileIngestResult {
  files: number;
  chunks: number;
  ids: string[];
  /** Files that could not be read (relative to root). */
  skipped: string[];
}

/**
 * Bulk ingestion of text files: discover by extension, split into
 * overlapping character chunks, ingest each file's chunks as one batch tagged
 * with its relative `path`.
 */
export class FileIngestor {
  private readonly root: string;
  private readonly allowedExt: string[];
  private readonly excludedFolders: string[];
  private readonly target: IngestTarget;
  private readonly chunkSize: number;
  private readonly chunkOverlap: number;
  private readonly verbose: boolean;

  public constructor(opts: FileIngestorOptions) {
    this.root = path.resolve(opts.root);
    this.allowedExt = opts.allowedExt;
    this.excludedFolders = opts.excludedFolders;
    this.target = opts.target;
    this.verbose = !!opts.verbose;
    this.chunkSize = opts.chunkSize ?? 800;
    let overlap = opts.chunkOverlap ?? 120;
    // Overlap must stay below size for forward progress
    if (overlap >= this.chunkSize) {
      const fallback = Math.max(0, Math.floor(this.chunkSize * 0.15));
      console.error(
        `[MCP] Provided chunkOverlap (=${overlap}) >= chunkSize (=${this.chunkSize}). Using fallback overlap ${fallback}.`,
      );
      overlap = fallback;
    }
    this.chunkOverlap = overlap;
  }

  public getRoot(): string {
    return this.root;
  }

  /**
   * Split arbitrary text into (roughly) fixed-size overlapping chunks. The
   * final chunk may be shorter.
   *
   * @param size Target maximum characters per chunk.
   * @param overlap Characters of trailing overlap retained from the previous
   * chunk. Must be < size for forward progress.
   */
  public static splitChunks(text: string, size = 800, overlap = 120): string[] {
    const out: string[] = [];
    let i = 0;
    while (i < text.length) {
      out.push(text.slice(i, i + size));
      i += Math.max(1, size - overlap);
    }
    return out;
  }

  /** Ensure a (possibly user-supplied) relative path stays within root. */
  public ensureWithinRoot(relPath: string): string {
    return FileIngestor.ensureWithinRoot(this.root, relPath);
  }

  /**
   * Resolve `relPath` against `root`, rejecting traversal outside it.
   *
   * @throws {RangeError} If the resolved path escapes root.
   */
  public static ensureWithinRoot(root: string, relPath: string): string {
    const base = path.resolve(root);
    const abs = path.resolve(base, relPath);
    if (abs !== base && !abs.startsWith(base + path.sep)) {
      throw new RangeError(`Path outside ingest root: ${relPath}`);
    }
    return abs;
  }

  /**
   * Ingest every matching file below `dir` (relative to root). Files are
   * processed sequentially in path order; an ingest failure aborts the run
   * with earlier files already stored.
   */
  public async ingestDirectory(dir = ".", metadata: Metadata = {}): Promise<FileIngestResult> {
    const base = this.ensureWithinRoot(dir);
    const files = await this.discoverFiles(base);
    console.error(`[MCP] Ingesting ${files.length} files from ${base}`);

    const result: FileIngestResult = { files: 0, chunks: 0, ids: [], skipped: [] };
    for (const file of files) {
      let content: string;
      try {
        content = await fs.readFile(file.abs, "utf8");
      } catch (e) {
        console.error(`[MCP] Skipping unreadable file ${file.rel}:`, e);
        result.skipped.push(file.rel);
        continue;
      }
      const chunks = FileIngestor.splitChunks(content, this.chunkSize, this.chunkOverlap);
      if (!chunks.length) continue;
      const ids = await this.target.ingest(chunks, { ...metadata, path: file.rel });
      result.files++;
      result.chunks += chunks.length;
      result.ids.push(...ids);
      if (this.verbose) console.error(`[MCP][verbose] ${file.rel}: ${chunks.length} chunks`);
    }
    console.error(`[MCP] Ingested ${result.chunks} chunks from ${result.files} files.`);
    return result;
  }

  private async discoverFiles(base: string): Promise<{ rel: string; abs: string }[]> {
    const patterns = this.allowedExt.map((ext) => `**/*.${ext}`);
    const ignore = this.excludedFolders.map((f) => `**/${f}/**`);
    const files = await fg(patterns, { cwd: base, dot: false, absolute: true, onlyFiles: true, ignore });
    return files
      .map((abs) => ({ abs, rel: path.relative(this.root, abs).split(path.sep).join("/") }))
      .sort((a, b) => a.rel.localeCompare(b.rel));
  }
}
