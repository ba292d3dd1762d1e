import { logger } from "../core/logger";
import { paginate } from "../core/pagination";
import type { DateRange, GitLabGateway, ItemKind, ItemQuery, ItemSummary } from "../models/gitlab";
import { ValidationError, ValidationHelper, firstValue } from "../utils/validation";

const KIND_ALIASES = new Map<string, ItemKind>([
  ["issue", "issue"],
  ["issues", "issue"],
  ["mr", "merge_request"],
  ["mrs", "merge_request"],
  ["merge_request", "merge_request"],
  ["merge_requests", "merge_request"],
]);

export const ITEM_KIND_LABELS: Record<ItemKind, string> = {
  issue: "issues",
  merge_request: "merge requests",
};

export interface ItemServiceOptions {
  perPage: number;
  minYear: number;
  now?: () => Date;
}

export type YearBounds = Pick<ItemServiceOptions, "minYear" | "now">;

function readItemQuery(type: unknown, year: unknown, bounds?: YearBounds): ItemQuery {
  const rawType = firstValue(type);
  const rawYear = firstValue(year);
  const validation = new ValidationHelper();

  let kind: ItemKind | undefined;
  const typeIssue = ValidationHelper.nonEmpty(rawType, "type");
  if (typeIssue) {
    validation.check(typeIssue);
  } else if (typeof rawType === "string") {
    kind = KIND_ALIASES.get(rawType.trim().toLowerCase());
    if (!kind) {
      validation.check(`Invalid item type: ${rawType}. Must be 'issues' or 'mr'`);
    }
  }

  let parsedYear: number | undefined;
  const yearText = typeof rawYear === "number" ? String(rawYear) : rawYear;
  const yearIssue = ValidationHelper.nonEmpty(yearText, "year");
  if (yearIssue) {
    validation.check(yearIssue);
  } else if (typeof yearText === "string") {
    const trimmed = yearText.trim();
    if (!/^[0-9]{4}$/.test(trimmed)) {
      validation.check(`Year must be a 4-digit number, got '${yearText}'`);
    } else {
      parsedYear = parseInt(trimmed, 10);
      const rangeIssue = bounds ? checkYearBounds(parsedYear, bounds) : undefined;
      if (rangeIssue) {
        validation.check(rangeIssue);
        parsedYear = undefined;
      }
    }
  }

  validation.throwIfInvalid("Invalid item query");
  if (!kind || parsedYear === undefined) {
    throw new ValidationError("Invalid item query");
  }
  return { kind, year: parsedYear };
}

export function checkYearBounds(year: number, bounds: YearBounds): string | undefined {
  const currentYear = (bounds.now ?? (() => new Date()))().getUTCFullYear();
  if (year < bounds.minYear || year > currentYear) {
    return `Invalid year: ${year}. Must be between ${bounds.minYear} and ${currentYear}`;
  }
  return undefined;
}

/** Checks the type and the year's shape only; needs no configuration. */
export const parseItemInput = (type: unknown, year: unknown): ItemQuery => readItemQuery(type, year);

export const parseItemQuery = (type: unknown, year: unknown, bounds: YearBounds): ItemQuery =>
  readItemQuery(type, year, bounds);

export const yearRange = (year: number): DateRange => ({
  start: new Date(Date.UTC(year, 0, 1)),
  end: new Date(Date.UTC(year + 1, 0, 1)),
});

export const inRange = (createdAt: string, range: DateRange): boolean => {
  const created = Date.parse(createdAt);
  return !Number.isNaN(created) && created >= range.start.getTime() && created < range.end.getTime();
};

export class ItemService {
  constructor(
    private readonly gateway: GitLabGateway,
    private readonly options: ItemServiceOptions,
  ) {}

  parseQuery(type: unknown, year: unknown): ItemQuery {
    return parseItemQuery(type, year, this.options);
  }

  /**
   * Validates right away and throws ValidationError before any request is
   * sent. The returned sequence fetches pages as it is consumed and can only
   * be iterated once.
   */
  listItems(type: unknown, year: unknown): AsyncGenerator<ItemSummary, void, undefined> {
    return this.stream(this.parseQuery(type, year));
  }

  stream(query: ItemQuery): AsyncGenerator<ItemSummary, void, undefined> {
    logger.info(`Retrieving ${ITEM_KIND_LABELS[query.kind]} created in ${query.year}`);
    return this.iterate(query);
  }

  private async *iterate(query: ItemQuery): AsyncGenerator<ItemSummary, void, undefined> {
    const range = yearRange(query.year);
    const seen = new Set<number>();
    let received = 0;

    const pages = paginate((page) => {
      logger.debug(`Requesting page ${page} of ${ITEM_KIND_LABELS[query.kind]}`, {
        createdAfter: range.start.toISOString(),
        createdBefore: range.end.toISOString(),
      });
      return this.gateway.listItems({
        kind: query.kind,
        range,
        page,
        perPage: this.options.perPage,
      });
    });

    for await (const item of pages) {
      received++;
      if (seen.has(item.id) || !inRange(item.createdAt, range)) {
        continue;
      }
      seen.add(item.id);
      yield item;
    }

    logger.debug(`Kept ${seen.size} of ${received} ${ITEM_KIND_LABELS[query.kind]} from ${query.year}`);
  }
}
