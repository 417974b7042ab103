import type { Command } from 'commander';
import { computeChecksum, listDocuments, readDocument } from '@docvault/core';
import { ContentError } from '@docvault/shared';
import { withServices } from '../context';
import { OutputRenderer, type DocumentListing } from '../output';
import type { CliRuntime, GlobalOptions } from '../types';

export function registerListCommand(program: Command, runtime: CliRuntime) {
  program
    .command('list')
    .description('List knowledge documents and stored records with their ingestion state')
    .action(async () => {
      const globalOpts = program.opts<GlobalOptions>();

      const entries = await withServices(globalOpts, runtime, {}, async ({ config, store }) => {
        const [filenames, records] = await Promise.all([
          listDocuments(config.knowledgeDir, config.ingestion.extensions),
          store.allRecords(),
        ]);
        const recordsByName = new Map(records.map((record) => [record.filename, record]));
        const listing: DocumentListing[] = [];

        for (const filename of filenames) {
          let checksum: string;
          try {
            checksum = computeChecksum(
              await readDocument(config.knowledgeDir, filename, config.ingestion),
            );
          } catch (error) {
            if (!(error instanceof ContentError)) {
              throw error;
            }
            listing.push({ filename, state: 'unreadable', message: error.message });
            continue;
          }

          const record = recordsByName.get(filename);
          if (!record) {
            listing.push({ filename, state: 'new', checksum });
          } else {
            listing.push({
              filename,
              state: record.checksum === checksum ? 'ingested' : 'changed',
              checksum,
              chunkCount: record.chunks.length,
            });
          }
        }

        const present = new Set(filenames);
        for (const record of records) {
          if (!present.has(record.filename)) {
            listing.push({
              filename: record.filename,
              state: 'orphaned',
              checksum: record.checksum,
              chunkCount: record.chunks.length,
            });
          }
        }
        return listing;
      });

      new OutputRenderer(!!globalOpts.json).listing(entries);
    });
}
