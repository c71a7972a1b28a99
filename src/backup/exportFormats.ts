export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

const NATIVE_PREFIX = 'application/vnd.google-apps.';

export interface ExportTarget {
  mimeType: string;
  extension: string;
}

const DOCX: ExportTarget = {
  mimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  extension: 'docx',
};
const XLSX: ExportTarget = {
  mimeType: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  extension: 'xlsx',
};
const PPTX: ExportTarget = {
  mimeType: 'application/vnd.openxmlformats-officedocument.presentationml.presentation',
  extension: 'pptx',
};
const PDF: ExportTarget = { mimeType: 'application/pdf', extension: 'pdf' };
const SCRIPT_JSON: ExportTarget = {
  mimeType: 'application/vnd.google-apps.script+json',
  extension: 'json',
};

/**
 * Native document type -> interchange format. Native types missing here
 * (forms, sites, shortcuts...) cannot be retrieved at all.
 */
export const EXPORT_TARGETS: Readonly<Record<string, ExportTarget>> = {
  'application/vnd.google-apps.document': DOCX,
  'application/vnd.google-apps.spreadsheet': XLSX,
  'application/vnd.google-apps.presentation': PPTX,
  'application/vnd.google-apps.drawing': PDF,
  'application/vnd.google-apps.script': SCRIPT_JSON,
};

export type ContentMode =
  | { kind: 'download' }
  | { kind: 'export'; target: ExportTarget }
  | { kind: 'unavailable' };

export function isNativeDocument(mimeType: string): boolean {
  return mimeType.startsWith(NATIVE_PREFIX);
}

export function exportTargetFor(mimeType: string): ExportTarget | undefined {
  return Object.prototype.hasOwnProperty.call(EXPORT_TARGETS, mimeType) ? EXPORT_TARGETS[mimeType] : undefined;
}

export function resolveContentMode(mimeType: string): ContentMode {
  if (!isNativeDocument(mimeType)) {
    return { kind: 'download' };
  }
  const target = exportTargetFor(mimeType);
  return target ? { kind: 'export', target } : { kind: 'unavailable' };
}

export function extensionForExport(exportMimeType: string): string {
  for (const target of Object.values(EXPORT_TARGETS)) {
    if (target.mimeType === exportMimeType) return target.extension;
  }
  return 'pdf';
}
