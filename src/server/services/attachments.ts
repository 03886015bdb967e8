import type { Attachment, AttachmentKind } from '../types/index.js';

/** Extensions rendered inline as <img>. Everything else becomes a download link. */
export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif'] as const;

/**
 * Classify an attachment by its file name alone. No content sniffing:
 * a file with a misleading extension is rendered by its extension.
 */
export function classifyAttachment(fileName: string): AttachmentKind {
  const lower = fileName.toLowerCase();
  return IMAGE_EXTENSIONS.some((ext) => lower.endsWith(ext)) ? 'image' : 'generic';
}

/** Build the attachment descriptor for a message, or null when it has none. */
export function toAttachment(attachmentPath: string | null): Attachment | null {
  if (!attachmentPath) return null;
  return { fileName: attachmentPath, kind: classifyAttachment(attachmentPath) };
}

/**
 * URL of an attachment relative to a page. Each path segment is
 * percent-encoded so names with spaces or `#` still resolve.
 */
export function attachmentHref(fileName: string, base = '../attachments'): string {
  const encoded = fileName.split('/').map(encodeURIComponent).join('/');
  return `${base}/${encoded}`;
}
