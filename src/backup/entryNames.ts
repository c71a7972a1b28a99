import path from 'path';
import type { FileRecord } from './types.js';
import { extensionForExport } from './exportFormats.js';

const INVALID_CHARS = /[<>:"/\\|?*]/g;

/**
 * Archive-safe name for a record. Exports get the target extension unless
 * the name already carries it.
 */
export function safeEntryName(record: FileRecord): string {
  let name = record.name.replace(INVALID_CHARS, '_');
  if (name.trim() === '') {
    name = record.id;
  }

  if (record.exportMimeType) {
    const extension = extensionForExport(record.exportMimeType);
    if (!name.toLowerCase().endsWith(`.${extension}`)) {
      name = `${name}.${extension}`;
    }
  }

  return name;
}

/**
 * Hands out unique entry names for one backup job: the second
 * `report.pdf` becomes `report (2).pdf`.
 */
export class EntryNamer {
  private readonly used = new Set<string>();

  next(record: FileRecord): string {
    const base = safeEntryName(record);
    if (!this.used.has(base.toLowerCase())) {
      this.used.add(base.toLowerCase());
      return base;
    }

    const extension = path.extname(base);
    const stem = base.slice(0, base.length - extension.length);

    for (let n = 2; ; n++) {
      const candidate = `${stem} (${n})${extension}`;
      if (!this.used.has(candidate.toLowerCase())) {
        this.used.add(candidate.toLowerCase());
        return candidate;
      }
    }
  }
}
