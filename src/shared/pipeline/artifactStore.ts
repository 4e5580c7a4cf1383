/**
 * Artifact Store
 *
 * Writes the generated .tex and .pdf files of a run into an output directory.
 * Only used when ARTIFACTS_DIR is configured.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import type { GeneratedDocument } from '../types';

/**
 * File-name-safe form of a company name
 */
export function slugify(value: string): string {
  const slug = value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, 60)
    .replace(/-+$/, '');
  return slug || 'company';
}

export class ArtifactStore {
  private readonly rootPath: string;
  private readonly now: () => Date;

  /**
   * @param rootPath - Directory the artifacts are written to; created on first save
   */
  constructor(rootPath: string, now: () => Date = () => new Date()) {
    this.rootPath = path.resolve(rootPath);
    this.now = now;
  }

  getRootPath(): string {
    return this.rootPath;
  }

  /**
   * Write every document as `<company>-<timestamp>-<kind>.tex` and `.pdf`.
   * Returns the absolute paths written.
   */
  async save(company: string, documents: GeneratedDocument[]): Promise<string[]> {
    await fs.mkdir(this.rootPath, { recursive: true });

    const stamp = this.now().toISOString().replace(/[:.]/g, '-');
    const base = `${slugify(company)}-${stamp}`;
    const written: string[] = [];

    for (const document of documents) {
      const texPath = path.join(this.rootPath, `${base}-${document.kind}.tex`);
      const pdfPath = path.join(this.rootPath, `${base}-${document.kind}.pdf`);
      await fs.writeFile(texPath, document.latexSource, 'utf-8');
      await fs.writeFile(pdfPath, document.pdf);
      written.push(texPath, pdfPath);
    }

    return written;
  }
}
