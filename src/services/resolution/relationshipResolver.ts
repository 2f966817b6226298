import type { Logger } from "pino";
import type { CardRequest, Print, RelationshipEdge, RelationshipKind } from "../../domain/print";
import { failure, success, type Outcome } from "../../domain/outcome";
import { NotFoundError } from "../../errors";
import { moduleLogger } from "../../utils/logger";
import { slugify } from "../../utils/slug";
import type { CardIndex } from "../index/cardIndex";

/** The slice of CardIndex the resolver reads. */
export type PrintLookup = Pick<CardIndex, "findPrintsByName" | "findByCollectorNumber" | "getPrints" | "getEdges">;

export interface ResolveOptions {
  preferredSet?: string;
  preferredLang?: string;
  /** Follow `token` edges. Defaults to true. */
  includeTokens?: boolean;
}

export type PrintOrigin = "seed" | RelationshipKind;

export interface ResolvedPrint {
  print: Print;
  origin: PrintOrigin;
  /** The print whose edge pulled this one in; null for seeds. */
  viaPrintId: string | null;
  quantity: number;
}

export interface MissingItem {
  query: string;
  reason: "not_found" | "related_not_found";
  viaPrintId: string | null;
  error: NotFoundError;
}

export interface ResolutionResult {
  prints: ResolvedPrint[];
  missing: MissingItem[];
  stats: {
    requested: number;
    seedsResolved: number;
    expanded: number;
  };
}

export const NAME_SCORE = { exact: 3, prefix: 2, substring: 1, loose: 0 } as const;

/** Exact (whole name or front face) > prefix > substring, compared on slugs. */
export const scoreName = (query: string, print: Pick<Print, "name" | "nameSlug">): number => {
  const wanted = slugify(query);
  if (!wanted) return NAME_SCORE.loose;
  const [front = ""] = print.name.split(" // ");
  if (print.nameSlug === wanted || slugify(front) === wanted) return NAME_SCORE.exact;
  if (print.nameSlug.startsWith(wanted)) return NAME_SCORE.prefix;
  if (print.nameSlug.includes(wanted)) return NAME_SCORE.substring;
  return NAME_SCORE.loose;
};

interface Preference {
  setCode?: string;
  lang?: string;
}

const preferenceRank = (print: Print, preference: Preference): [number, number] => [
  preference.setCode && print.setCode === preference.setCode.toLowerCase() ? 0 : 1,
  preference.lang && print.lang === preference.lang.toLowerCase() ? 0 : 1,
];

/**
 * Total order over equally named candidates: preferred set, preferred
 * language, newest release, non-token, then smallest print id.
 */
export const compareCandidates = (a: Print, b: Print, preference: Preference): number => {
  const [aSet, aLang] = preferenceRank(a, preference);
  const [bSet, bLang] = preferenceRank(b, preference);
  if (aSet !== bSet) return aSet - bSet;
  if (aLang !== bLang) return aLang - bLang;
  const aDate = a.releasedAt ?? "";
  const bDate = b.releasedAt ?? "";
  if (aDate !== bDate) return aDate < bDate ? 1 : -1;
  if (a.isToken !== b.isToken) return a.isToken ? 1 : -1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
};

export const pickBestCandidate = (
  query: string,
  candidates: readonly Print[],
  preference: Preference,
  minimumScore: number = NAME_SCORE.loose,
): Print | null => {
  let best: { print: Print; score: number } | null = null;
  for (const print of candidates) {
    const score = scoreName(query, print);
    if (score < minimumScore) continue;
    if (
      !best ||
      score > best.score ||
      (score === best.score && compareCandidates(print, best.print, preference) < 0)
    ) {
      best = { print, score };
    }
  }
  return best?.print ?? null;
};

/**
 * Expands requested card names into every print needed to reproduce them:
 * the seeds, then everything reachable over relationship edges.
 */
export class RelationshipResolver {
  private readonly logger: Logger;

  constructor(
    private readonly index: PrintLookup,
    logger: Logger,
  ) {
    this.logger = moduleLogger(logger, "relationship-resolver");
  }

  resolveRequest(request: CardRequest, options: ResolveOptions = {}): Outcome<Print, NotFoundError> {
    const preference: Preference = {
      setCode: request.setCode ?? options.preferredSet,
      lang: request.lang ?? options.preferredLang,
    };

    if (request.setCode && request.collectorNumber) {
      const direct = [...this.index.findByCollectorNumber(request.setCode, request.collectorNumber)].sort((a, b) =>
        compareCandidates(a, b, preference),
      );
      if (direct.length > 0) return success(direct[0]);
    }

    const { prints } = this.index.findPrintsByName(request.name);
    const best = pickBestCandidate(request.name, prints, preference, NAME_SCORE.substring);
    return best ? success(best) : failure(new NotFoundError(request.name));
  }

  resolve(requests: readonly CardRequest[], options: ResolveOptions = {}): ResolutionResult {
    const includeTokens = options.includeTokens ?? true;
    const resolved = new Map<string, ResolvedPrint>();
    const order: ResolvedPrint[] = [];
    const missing: MissingItem[] = [];
    let seedsResolved = 0;

    const register = (entry: ResolvedPrint) => {
      resolved.set(entry.print.id, entry);
      order.push(entry);
    };

    for (const request of requests) {
      const outcome = this.resolveRequest(request, options);
      if (!outcome.ok) {
        missing.push({ query: request.name, reason: "not_found", viaPrintId: null, error: outcome.error });
        continue;
      }
      seedsResolved++;
      const existing = resolved.get(outcome.value.id);
      if (existing) {
        existing.quantity += request.quantity;
        continue;
      }
      register({ print: outcome.value, origin: "seed", viaPrintId: null, quantity: request.quantity });
    }

    // Breadth-first over edges; `resolved` doubles as the visited set, so a
    // print is enqueued at most once and cyclic graphs terminate.
    for (let cursor = 0; cursor < order.length; cursor++) {
      const current = order[cursor].print;
      // A token's own edges list every card that creates it.
      if (current.isToken) continue;

      const edges = this.index
        .getEdges(current.id)
        .filter((edge) => includeTokens || edge.kind !== "token");
      if (edges.length === 0) continue;

      const byId = this.index.getPrints(edges.map((edge) => edge.relatedPrintId));
      for (const edge of edges) {
        const target = byId.get(edge.relatedPrintId) ?? this.resolveRelatedByName(edge, current, options);
        if (!target) {
          const query = edge.relatedCardName || edge.relatedPrintId;
          missing.push({
            query,
            reason: "related_not_found",
            viaPrintId: current.id,
            error: new NotFoundError(query, `Related card "${query}" (${edge.kind}) of ${current.name} is not indexed`),
          });
          continue;
        }
        if (resolved.has(target.id)) continue;
        register({ print: target, origin: edge.kind, viaPrintId: current.id, quantity: 1 });
      }
    }

    if (missing.length > 0) {
      this.logger.info(
        { missing: missing.map((item) => item.query), requested: requests.length },
        "Some requested cards could not be resolved",
      );
    }

    return {
      prints: order,
      missing,
      stats: {
        requested: requests.length,
        seedsResolved,
        expanded: order.length - order.filter((entry) => entry.origin === "seed").length,
      },
    };
  }

  /** Falls back to the related card's name when its exact print is not in the index. */
  private resolveRelatedByName(edge: RelationshipEdge, source: Print, options: ResolveOptions): Print | null {
    if (!edge.relatedCardName) return null;
    const { prints } = this.index.findPrintsByName(edge.relatedCardName);
    const wantToken = edge.kind === "token";
    const sameFamily = prints.filter((print) => print.isToken === wantToken);
    const pool = sameFamily.length > 0 ? sameFamily : prints;
    const match = pickBestCandidate(
      edge.relatedCardName,
      pool,
      { setCode: options.preferredSet, lang: source.lang },
      NAME_SCORE.exact,
    );
    if (match) {
      this.logger.debug(
        { sourcePrintId: source.id, relatedPrintId: edge.relatedPrintId, substitute: match.id },
        "Related print resolved by name",
      );
    }
    return match;
  }
}
