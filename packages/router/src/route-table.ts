/* packages/router/src/route-table.ts */

import { UriTemplate, compareSpecificity } from "@urimatch/template";

export interface RouteLogger {
  warn(message: string): void;
}

export interface RouteTableOptions {
  /** Receives build-time warnings; defaults to `console` */
  logger?: RouteLogger;
}

export interface RouteEntry<T> {
  readonly template: UriTemplate;
  readonly value: T;
}

export interface RouteMatch<T> {
  value: T;
  template: UriTemplate;
  params: Record<string, string>;
}

/** Immutable route table, ordered most specific first */
export class RouteTable<T> {
  readonly routes: readonly RouteEntry<T>[];

  /** Use {@link RouteTableBuilder.build} */
  constructor(routes: readonly RouteEntry<T>[]) {
    this.routes = Object.freeze([...routes]);
    Object.freeze(this);
  }

  get size(): number {
    return this.routes.length;
  }

  /** First route, in specificity order, whose template matches the whole path */
  match(path: string): RouteMatch<T> | null {
    for (const route of this.routes) {
      const params = route.template.matchParams(path);
      if (params) return { value: route.value, template: route.template, params };
    }
    return null;
  }
}

export class RouteTableBuilder<T> {
  private readonly entries: RouteEntry<T>[] = [];
  private readonly logger: RouteLogger;

  constructor(options: RouteTableOptions = {}) {
    this.logger = options.logger ?? console;
  }

  add(template: string | UriTemplate, value: T): this {
    const compiled = typeof template === "string" ? new UriTemplate(template) : template;
    this.entries.push({ template: compiled, value });
    return this;
  }

  /**
   * Sort the registered routes and freeze them into a table. A template whose
   * pattern equals an earlier registration's can never match first, so it is
   * dropped with a warning.
   */
  build(): RouteTable<T> {
    const kept: RouteEntry<T>[] = [];
    for (const entry of this.entries) {
      const earlier = kept.find((k) => k.template.equals(entry.template));
      if (earlier) {
        this.logger.warn(
          `Route "${entry.template.template}" is shadowed by "${earlier.template.template}"`,
        );
        continue;
      }
      kept.push(entry);
    }
    kept.sort((a, b) => compareSpecificity(a.template, b.template));
    return new RouteTable(kept);
  }
}
