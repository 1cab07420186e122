/**
 * `mutaform scan`: list candidate mutation sites without executing them.
 */

import { formatCoordinate } from '../../layers/L0-syntax-tree';
import type { CliPipeline } from '../local-pipeline';
import { formatScanListing } from '../output';

export async function runScan(
  pipeline: CliPipeline,
  files: string[],
  json: boolean,
  write: (msg: string) => void = console.log,
): Promise<number> {
  const listing = await pipeline.scan(files);

  if (json) {
    write(
      JSON.stringify(
        {
          files: listing.files,
          sites: listing.sites.map((site) => ({
            id: site.id,
            file: site.file,
            line: site.line,
            coordinate: formatCoordinate(site.coordinate),
            operator: site.operator_id,
            original: site.original,
            replacement: site.replacement,
          })),
          equivalent: listing.equivalent.map((e) => ({ id: e.site.id, reason: e.reason })),
          failures: listing.failures.map((f) => ({ id: f.site.id, message: f.error.message })),
        },
        null,
        2,
      ),
    );
    return 0;
  }

  if (listing.files.length === 0) {
    write('  No source files matched sources.include.');
    return 0;
  }
  write(`Mutaform: Scanning ${listing.files.length} file${listing.files.length !== 1 ? 's' : ''}...`);
  write(formatScanListing(listing.sites, listing.equivalent));
  return 0;
}
