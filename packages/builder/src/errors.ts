/**
 * Error types raised by the builder, dispatcher and fetch pipeline.
 *
 * Library code throws these; only the CLI scripts turn them into exit codes.
 */

/** A query configuration or env setting that cannot be used */
export class InvalidConfigurationError extends Error {
  constructor(
    /** Dotted path of the offending field, e.g. "rules[2].values" */
    public readonly field: string,
    message: string,
  ) {
    super(`Invalid configuration (${field}): ${message}`);
    this.name = "InvalidConfigurationError";
  }
}

export class QueryFileError extends Error {
  constructor(
    public readonly path: string,
    message: string,
  ) {
    super(message);
    this.name = "QueryFileError";
  }
}

/**
 * Overpass answered, but reported a problem in-band.
 *
 * Runtime errors and timeouts come back as a 200 with a `remark` field
 * instead of an HTTP error status.
 */
export class OverpassRemarkError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly remark: string,
    options?: { cause?: unknown },
  ) {
    super(`Overpass remark from ${endpoint}: ${remark}`, options);
    this.name = "OverpassRemarkError";
  }
}

/** An endpoint did not answer within the request timeout */
export class OverpassTimeoutError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly timeoutMs: number,
  ) {
    super(`Overpass request to ${endpoint} timed out after ${timeoutMs} ms`);
    this.name = "OverpassTimeoutError";
  }
}

/** Every endpoint failed in every round */
export class OverpassFetchError extends Error {
  constructor(
    public readonly lastEndpoint: string | undefined,
    public readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(
      `All Overpass endpoints failed after ${attempts} attempts` +
        (lastEndpoint ? ` (last endpoint tried: ${lastEndpoint})` : ""),
      options,
    );
    this.name = "OverpassFetchError";
  }
}

export class EmptyResultError extends Error {
  constructor() {
    super("No usable point features returned");
    this.name = "EmptyResultError";
  }
}

/** The new result shrank too much compared with the previous output */
export class FeatureDropError extends Error {
  constructor(
    public readonly oldCount: number,
    public readonly newCount: number,
    public readonly dropPct: number,
  ) {
    super(
      `Safety check failed: ${oldCount} -> ${newCount} (${dropPct.toFixed(1)}% drop)`,
    );
    this.name = "FeatureDropError";
  }
}
