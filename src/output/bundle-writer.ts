import { createHash, randomUUID } from 'crypto';
import { mkdirSync, writeFileSync } from 'fs';
import * as path from 'path';
import { LineEnding, SeparatorStyle, type Settings } from '../presets/types';
import { formatFileSize } from '../utils/file-size';

export const BOUNDARY_PREFIX = 'ONEBUNDLE';
const DETAILED_RULE = '='.repeat(88);

export interface BundledFile {
  path: string;
  extension: string;
  sizeBytes: number;
  modified: Date;
  // Content after the action pipeline
  content: string;
  settings: Readonly<Settings>;
}

export interface BundleWriterOptions {
  // Boundary ids for MachineReadable blocks; random UUIDs by default
  idFactory?: () => string;
}

export function checksum(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

function eolFor(lineEnding: LineEnding): string {
  return lineEnding === LineEnding.CRLF ? '\r\n' : '\n';
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

function typeLabel(extension: string): string {
  return extension === '' ? '[no extension]' : extension;
}

interface Frame {
  header: string[];
  footer: string[];
}

/*
 * Renders one file as a header, its content and an optional footer, each
 * line ended by the file's own line ending.
 */
export class BundleWriter {
  private readonly idFactory: () => string;

  constructor(options: BundleWriterOptions = {}) {
    this.idFactory = options.idFactory ?? randomUUID;
  }

  renderFile(file: BundledFile): string {
    const eol = eolFor(file.settings.lineEnding);
    const content = file.content.replace(/\r?\n/g, eol);
    const frame = this.frame(file, checksum(file.content));

    const parts = [...frame.header, content, ...frame.footer];
    return parts.join(eol);
  }

  // Files are separated by one blank line
  render(files: BundledFile[]): string {
    return files
      .map((file, index) => {
        const eol = eolFor(file.settings.lineEnding);
        return `${index > 0 ? eol : ''}${this.renderFile(file)}${eol}`;
      })
      .join('');
  }

  write(outputPath: string, files: BundledFile[]): void {
    mkdirSync(path.dirname(outputPath), { recursive: true });
    writeFileSync(outputPath, this.render(files), 'utf-8');
  }

  private frame(file: BundledFile, sha: string): Frame {
    const { includeMetadata, separatorStyle } = file.settings;
    switch (separatorStyle) {
      case SeparatorStyle.None:
        return { header: [], footer: [] };

      case SeparatorStyle.Standard:
        return {
          header: [includeMetadata ? `======= ${file.path} | CHECKSUM_SHA256: ${sha} ======` : `======= ${file.path} ======`],
          footer: [],
        };

      case SeparatorStyle.Detailed: {
        const header = [DETAILED_RULE, `== FILE: ${file.path}`];
        if (includeMetadata) {
          header.push(
            `== DATE: ${formatDate(file.modified)} | SIZE: ${formatFileSize(file.sizeBytes)} | TYPE: ${typeLabel(file.extension)}`,
            `== CHECKSUM_SHA256: ${sha}`
          );
        }
        header.push(DETAILED_RULE);
        return { header, footer: [] };
      }

      case SeparatorStyle.Markdown: {
        const hint = file.extension.startsWith('.') ? file.extension.slice(1) : '';
        const header = [`## ${file.path}`];
        if (includeMetadata) {
          header.push(
            `**Date Modified:** ${formatDate(file.modified)} | **Size:** ${formatFileSize(file.sizeBytes)} | ` +
              `**Type:** ${typeLabel(file.extension)} | **Checksum (SHA256):** ${sha}`
          );
        }
        header.push('', `\`\`\`${hint}`);
        return { header, footer: ['```'] };
      }

      case SeparatorStyle.MachineReadable: {
        const id = this.idFactory();
        const meta: Record<string, string | number> = {
          original_filepath: file.path,
          original_filename: path.posix.basename(file.path),
        };
        if (includeMetadata) {
          meta.timestamp_utc_iso = file.modified.toISOString();
          meta.type = typeLabel(file.extension);
          meta.size_bytes = file.sizeBytes;
          meta.checksum_sha256 = sha;
        }
        return {
          header: [
            `--- ${BOUNDARY_PREFIX}_BEGIN_FILE_METADATA_BLOCK_${id} ---`,
            'METADATA_JSON:',
            ...JSON.stringify(meta, null, 4).split('\n'),
            `--- ${BOUNDARY_PREFIX}_END_FILE_METADATA_BLOCK_${id} ---`,
            `--- ${BOUNDARY_PREFIX}_BEGIN_FILE_CONTENT_BLOCK_${id} ---`,
          ],
          footer: [`--- ${BOUNDARY_PREFIX}_END_FILE_CONTENT_BLOCK_${id} ---`],
        };
      }
    }
  }
}
