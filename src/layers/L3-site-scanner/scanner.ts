import { createLogger } from '../../shared/logger';
import { ERROR_CODES, MutaformError, toError, type MutationSite } from '../../shared/types';
import { formatCoordinate, renderNode, walkScannable, type Form, type ParsedSource } from '../L0-syntax-tree';
import type { MutationOperator } from '../L1-operator-catalog';

const log = createLogger({ layer: 'L3', module: 'scanner' });

export interface ScanFailure {
  site: MutationSite;
  error: MutaformError;
}

export interface ScanResult {
  sites: MutationSite[];
  /** Sites whose replacement generator threw; recorded as `error` verdicts */
  failures: ScanFailure[];
}

export function siteId(formId: string, coordinate: string, operatorId: string): string {
  return `${formId}@${coordinate}:${operatorId}`;
}

/**
 * Scan forms of one parsed source. Output order is tree order (pre-order,
 * forms in source order), then operator declaration order; `scan_order`
 * numbers sites consecutively from `startOrder`.
 */
export function scanForms(
  source: ParsedSource,
  forms: readonly Form[],
  operators: readonly MutationOperator[],
  startOrder = 0,
): ScanResult {
  const sites: MutationSite[] = [];
  const failures: ScanFailure[] = [];
  let order = startOrder;

  for (const form of forms) {
    for (const visit of walkScannable(form.node)) {
      const coordinate = formatCoordinate(visit.coordinate);
      const line = visit.node.span ? source.lines.lineAt(visit.node.span.start) : form.startLine;

      for (const operator of operators) {
        const match = operator.bind({ node: visit.node, parent: visit.parent, index: visit.index });
        if (!match) continue;

        const site: MutationSite = {
          id: siteId(form.id, coordinate, operator.id),
          file: source.file,
          form_id: form.id,
          form_line: form.startLine,
          line,
          coordinate: visit.coordinate,
          operator_id: operator.id,
          category: operator.category,
          family: operator.family,
          hardness: operator.hardness,
          original: renderNode(visit.node),
          replacement: '',
          scan_order: order++,
          snapshot: source.snapshot,
        };

        try {
          site.replacement = renderNode(match.generate());
          sites.push(site);
        } catch (err) {
          const error = new MutaformError({
            code: ERROR_CODES.MUTATION_APPLY_FAILURE,
            severity: 'medium',
            message: `Replacement generator for ${operator.id} failed at ${site.id}`,
            context: { siteId: site.id },
            cause: toError(err),
          });
          log.warn({ code: error.code, siteId: site.id, err }, error.message);
          failures.push({ site, error });
        }
      }
    }
  }

  return { sites, failures };
}

export function scanSource(source: ParsedSource, operators: readonly MutationOperator[], startOrder = 0): ScanResult {
  return scanForms(source, source.forms, operators, startOrder);
}
