import type { ClusterKeyKind, MutationSite, SiteResult } from '../../shared/types';
import { callHead, formatCoordinate, nodeAtPath, resolvePath, type Form } from '../L0-syntax-tree';

export interface Cluster {
  key: string;
  members: MutationSite[];
  representative: MutationSite;
}

export interface ClusterOptions {
  key: ClusterKeyKind;
  /** Leading coordinate segments shared by a `location` cluster */
  prefixDepth: number;
  /** Forms the sites were scanned from; needed for the `shape` key */
  forms?: ReadonlyMap<string, Form>;
}

/** Head symbol of the parent call, or the parent's delimiter kind. */
export function parentShape(form: Form | undefined, site: MutationSite): string {
  if (!form || site.coordinate.length === 0) return 'root';
  const path = resolvePath(form.node, site.coordinate);
  const parent = nodeAtPath(form.node, path.slice(0, -1));
  const head = callHead(parent);
  if (head !== undefined) return `(${head} …)`;
  switch (parent.kind) {
    case 'ordered':
    case 'associative':
      return `${parent.open}…`;
    case 'quoted':
      return `${parent.prefix}…`;
    case 'token':
      return 'token';
  }
}

export function clusterKey(site: MutationSite, options: ClusterOptions): string {
  switch (options.key) {
    case 'operator':
      return `operator:${site.operator_id}`;
    case 'location':
      return `location:${site.file}|${site.form_id}|${formatCoordinate(site.coordinate.slice(0, options.prefixDepth))}`;
    case 'shape':
      return `shape:${site.category}|${parentShape(options.forms?.get(site.form_id), site)}`;
  }
}

/** Highest hardness wins; ties go to the earlier scan position. */
function pickRepresentative(members: MutationSite[]): MutationSite {
  return members.reduce((best, site) =>
    site.hardness > best.hardness || (site.hardness === best.hardness && site.scan_order < best.scan_order)
      ? site
      : best,
  );
}

/** Group sites; clusters come out in order of their first member. */
export function clusterSites(sites: readonly MutationSite[], options: ClusterOptions): Cluster[] {
  const groups = new Map<string, MutationSite[]>();
  for (const site of [...sites].sort((a, b) => a.scan_order - b.scan_order)) {
    const key = clusterKey(site, options);
    const members = groups.get(key) ?? [];
    members.push(site);
    groups.set(key, members);
  }
  return [...groups].map(([key, members]) => ({ key, members, representative: pickRepresentative(members) }));
}

/** One cluster per site, for runs with clustering disabled. */
export function singletonClusters(sites: readonly MutationSite[]): Cluster[] {
  return sites.map((site) => ({ key: `site:${site.id}`, members: [site], representative: site }));
}

/**
 * Copy each representative's verdict onto the cluster's other members, which
 * never run. Clusters whose representative has no result are skipped.
 */
export function propagateVerdicts(clusters: readonly Cluster[], executed: ReadonlyMap<string, SiteResult>): SiteResult[] {
  const results: SiteResult[] = [];
  for (const cluster of clusters) {
    const rep = executed.get(cluster.representative.id);
    if (!rep) continue;
    for (const member of cluster.members) {
      if (member.id === cluster.representative.id) {
        results.push(rep);
        continue;
      }
      results.push({
        ...rep,
        site_id: member.id,
        file: member.file,
        form_id: member.form_id,
        line: member.line,
        coordinate: formatCoordinate(member.coordinate),
        operator_id: member.operator_id,
        original: member.original,
        replacement: member.replacement,
        propagated_from: rep.site_id,
        duration_ms: 0,
      });
    }
  }
  return results;
}
