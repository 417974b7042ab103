import pc from 'picocolors';
import type { IngestResult } from '@docvault/core';
import type { IngestStatus } from '@docvault/shared';
import { printTable } from './table';

export type DocumentState = 'new' | 'ingested' | 'changed' | 'orphaned' | 'unreadable';

export interface DocumentListing {
  filename: string;
  state: DocumentState;
  chunkCount?: number;
  checksum?: string;
  /** Why an `unreadable` document could not be read */
  message?: string;
}

export interface StatusReport {
  backend: string;
  location: string;
  knowledgeDir: string;
  embedder: string;
  recordCount: number;
  chunkCount: number;
  dimensions: number[];
}

const STATE_COLORS: Record<DocumentState, (text: string) => string> = {
  new: pc.cyan,
  ingested: pc.green,
  changed: pc.yellow,
  orphaned: pc.magenta,
  unreadable: pc.red,
};

const STATUS_ICONS: Record<IngestStatus, string> = {
  created: pc.green('+'),
  updated: pc.yellow('~'),
  skipped_duplicate: pc.gray('='),
  failed: pc.red('x'),
};

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  listing(entries: DocumentListing[]): void {
    if (this.isJson) {
      this.json(entries);
      return;
    }
    if (entries.length === 0) {
      console.log(pc.gray('No documents found.'));
      return;
    }
    printTable(
      ['state', 'filename', 'chunks'],
      entries.map((entry) => [
        STATE_COLORS[entry.state](entry.state),
        entry.filename,
        entry.state === 'unreadable' ? (entry.message ?? '') : (entry.chunkCount ?? '-'),
      ]),
    );
  }

  ingestResults(results: IngestResult[]): void {
    if (this.isJson) {
      this.json(results);
      return;
    }
    for (const result of results) {
      console.log(`${STATUS_ICONS[result.status]} ${pc.bold(result.filename)}: ${result.message}`);
    }

    const counts: Record<IngestStatus, number> = {
      created: 0,
      updated: 0,
      skipped_duplicate: 0,
      failed: 0,
    };
    results.forEach((result) => counts[result.status]++);
    console.log(
      `\n${counts.created} created, ${counts.updated} updated, ` +
        `${counts.skipped_duplicate} unchanged, ${counts.failed} failed`,
    );
  }

  status(report: StatusReport): void {
    if (this.isJson) {
      this.json(report);
      return;
    }
    console.log(pc.bold('Vector store'));
    console.log(`  Backend:    ${report.backend}`);
    console.log(`  Location:   ${report.location}`);
    console.log(`  Records:    ${report.recordCount}`);
    console.log(`  Chunks:     ${report.chunkCount}`);
    console.log(
      `  Dimensions: ${report.dimensions.length > 0 ? report.dimensions.join(', ') : pc.gray('none')}`,
    );
    console.log(pc.bold('\nSources'));
    console.log(`  Knowledge:  ${report.knowledgeDir}`);
    console.log(`  Embedder:   ${report.embedder}`);
  }

  removal(filename: string, removed: boolean): void {
    if (this.isJson) {
      this.json({ filename, removed });
    } else if (removed) {
      console.log(`${pc.green('Removed')} ${filename}`);
    } else {
      console.log(pc.yellow(`No stored record for ${filename}`));
    }
  }
}
