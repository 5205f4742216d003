// Domain types for autofields - listing field extraction

export type AcquisitionBackend = "dynamic" | "static";
export type AcquisitionMode = "auto" | AcquisitionBackend;

export type ErrorCode =
  // Acquisition errors
  | "FETCH_TIMEOUT" | "FETCH_DNS" | "FETCH_CONNECTION" | "FETCH_TLS" | "FETCH_HTTP_4XX" | "FETCH_HTTP_5XX"
  | "FETCH_NOT_HTML" | "BROWSER_UNAVAILABLE" | "RENDER_FAILED"
  | "ACQUISITION_FAILED"
  // Field errors
  | "FIELD_ABSENT" | "NORMALIZATION_EMPTY" | "EXTRACT_FIELD_ERROR"
  // Input errors
  | "INVALID_URL" | "CONFIG_INVALID"
  | "UNKNOWN";

export type AbsenceReason = Extract<ErrorCode, "FIELD_ABSENT" | "NORMALIZATION_EMPTY" | "EXTRACT_FIELD_ERROR">;

export type AttributeTarget = "text" | "html" | "value" | `attr:${string}`;

/**
 * Segment of a path into an embedded JSON document.
 * A `{ where, equals }` segment picks the first array item whose `where` key equals the value.
 */
export type JsonPathSegment = string | number | { where: string; equals: string };

/** Regex applied to each located text; first group (or whole match) is kept, no match drops the node */
interface Capture {
  capture?: string;
}

export type Strategy =
  | ({ kind: "css"; selector: string; attribute?: AttributeTarget } & Capture)
  | ({ kind: "attributeContains"; attribute: string; substring: string; tag?: string; read?: AttributeTarget } & Capture)
  | ({ kind: "childAt"; selector: string; index: number; attribute?: AttributeTarget } & Capture)
  | { kind: "regex"; pattern: string; flags?: string; group?: number }
  | ({
      kind: "containsText";
      selector: string;
      text: string;
      /** "own": the element's direct text holds `text`; "deep": any descendant text does (default "own") */
      match?: "own" | "deep";
      ancestorDepth?: number;
      target?: string;
      childIndex?: number;
    } & Capture)
  | { kind: "xpath"; expression: string }
  | {
      kind: "embeddedJson";
      selector: string;
      attribute?: string;
      root: JsonPathSegment[];
      path: JsonPathSegment[];
      format?: "brl";
      /**
       * Composes an object at `path` into one text, e.g. "{municipality} - {uf}"; yields
       * nothing unless every placeholder holds a string or number
       */
      template?: string;
    };

export type StrategyKind = Strategy["kind"];

export interface NormalizeOptions {
  /** Case-insensitive patterns; everything from the first match onwards is dropped */
  cutPatterns?: RegExp[];
  /** Tokens removed from the start of the value (currency symbols, URI schemes) */
  prefixTokens?: string[];
  /** How separated text segments are combined (default "first") */
  segments?: "first" | "join";
}

export type Disambiguator = (text: string) => boolean;

export interface FieldSpec {
  readonly name: string;
  readonly strategies: readonly Strategy[];
  readonly required: boolean;
  readonly disambiguator?: Disambiguator;
  readonly normalize?: NormalizeOptions;
  /** Parse the normalized value into a number (prices, mileage, year) */
  readonly numeric?: boolean;
}

export interface Candidate {
  text: string;
  strategyIndex: number;
  strategyKind: StrategyKind;
  /** Position of the node among the strategy's matches */
  position: number;
}

export interface ResolvedField {
  status: "resolved";
  field: string;
  required: boolean;
  value: string;
  strategyIndex: number;
  strategyKind: StrategyKind;
  amount?: number | null;
}

export interface AbsentField {
  status: "missing" | "not_available";
  field: string;
  required: boolean;
  value: null;
  strategyIndex: null;
  reason: AbsenceReason;
  detail?: string;
}

export type ExtractionResult = ResolvedField | AbsentField;

export interface ExtractionReport {
  url: string | null;
  backend: AcquisitionBackend | null;
  results: readonly ExtractionResult[];
  resolvedCount: number;
  total: number;
  missingRequired: readonly string[];
  /** Resolved required fields over required fields; optional fields never lower it */
  successRatio: number;
  complete: boolean;
}
