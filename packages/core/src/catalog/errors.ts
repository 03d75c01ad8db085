/**
 * Raised synchronously by the catalog loader. A catalog either loads whole or
 * not at all, so the issues list covers every problem found in one pass.
 */
export class MalformedCatalogError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Malformed rule catalog: ${issues.join("; ")}`);
    this.name = "MalformedCatalogError";
    this.issues = issues;
  }
}
