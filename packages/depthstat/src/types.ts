/**
 * Core type definitions for depthstat.
 * All domain types live here - the single source of truth.
 */

// =============================================================================
// Result Type
// =============================================================================

export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

// =============================================================================
// Series Types
// =============================================================================

export type SeriesKind = 'continuous' | 'discrete' | 'sampled';

export interface DepthSeries {
  readonly name: string;
  readonly kind: SeriesKind;
  /** Strictly increasing measured depths. */
  readonly depths: readonly number[];
  /** One value per depth; NaN marks an absent sample. */
  readonly values: readonly number[];
  /** Code to display name, discrete series only. */
  readonly labels: ReadonlyMap<number, string> | null;
  readonly unit: string;
  readonly description: string;
}

export interface DepthSeriesInput {
  readonly name: string;
  readonly kind?: SeriesKind;
  readonly depths: readonly number[];
  readonly values: readonly (number | null)[];
  readonly labels?: ReadonlyMap<number, string> | Readonly<Record<string, string>> | null;
  readonly unit?: string;
  readonly description?: string;
  /** Sentinel converted to NaN on creation. */
  readonly nullValue?: number | null;
}

export type DiscreteResampleMethod = 'previous' | 'nearest';

export interface ResampleOptions {
  readonly discreteMethod?: DiscreteResampleMethod;
}

export interface BoundaryInsertOptions {
  /** Split sampled (point) series as well. */
  readonly force?: boolean;
}

export interface BoundaryInsertion {
  readonly series: DepthSeries;
  readonly insertedDepths: readonly number[];
  /** Position of every original sample in the corrected grid. */
  readonly indexMap: readonly number[];
}

// =============================================================================
// Grouping Types
// =============================================================================

export interface GroupKey {
  readonly classifier: string;
  readonly label: string;
}

export interface GroupNode {
  readonly path: readonly GroupKey[];
  readonly indices: readonly number[];
  readonly children: readonly GroupNode[];
}

export interface ClassifierLabels {
  readonly labels: readonly string[];
  readonly warnings: readonly UnmappedLabelWarning[];
}

export interface ClassifierZones {
  readonly depths: readonly number[];
  readonly codes: readonly number[];
}

// =============================================================================
// Statistics Types
// =============================================================================

export type CalculationMode = 'weighted' | 'arithmetic' | 'both';

export type Statistic =
  | { readonly kind: 'single'; readonly value: number }
  | { readonly kind: 'dual'; readonly weighted: number; readonly arithmetic: number };

export interface ValueRange {
  readonly min: number;
  readonly max: number;
}

export interface Percentiles {
  readonly p10: Statistic;
  readonly p50: Statistic;
  readonly p90: Statistic;
}

export interface StatisticsRecord {
  readonly calculation: CalculationMode;
  readonly mean: Statistic;
  readonly sum: Statistic;
  readonly stdDev: Statistic;
  readonly percentiles: Percentiles;
  readonly range: ValueRange;
  readonly depthRange: ValueRange;
  readonly samples: number;
  readonly depthSamples: number;
  readonly thickness: number;
  readonly grossThickness: number;
  readonly thicknessFraction: number;
}

export type EmptyGroupPolicy = 'omit' | 'error';

export type AlignmentPolicy = 'project' | 'strict';

export interface GroupOptions {
  /** Defaults to weighted, or arithmetic for sampled series. */
  readonly mode?: CalculationMode;
  /** Overrides the per-kind default (skip for sampled, insert otherwise). */
  readonly insertBoundaries?: boolean;
  readonly alignment?: AlignmentPolicy;
  readonly onEmptyGroup?: EmptyGroupPolicy;
  readonly discreteMethod?: DiscreteResampleMethod;
}

export interface GroupStatistics {
  readonly path: readonly GroupKey[];
  readonly indices: readonly number[];
  readonly record: StatisticsRecord;
}

export interface GroupedStatistics {
  readonly series: string;
  readonly mode: CalculationMode;
  readonly classifiers: readonly string[];
  /** Boundary-corrected depth grid the indices refer to. */
  readonly depths: readonly number[];
  readonly insertedDepths: readonly number[];
  readonly groups: readonly GroupStatistics[];
  readonly warnings: readonly StatsWarning[];
}

export type NestedStatistics = StatisticsRecord | { readonly [label: string]: NestedStatistics };

// =============================================================================
// Project Types
// =============================================================================

export interface Registry<T> {
  readonly kind: string;
  readonly register: (key: string, item: T) => Registry<T>;
  readonly get: (key: string) => Result<T, NotFoundError>;
  readonly has: (key: string) => boolean;
  readonly remove: (key: string) => boolean;
  readonly keys: () => readonly string[];
  readonly entries: () => readonly (readonly [string, T])[];
}

export interface Well {
  readonly name: string;
  readonly sources: Registry<Registry<DepthSeries>>;
}

export interface Project {
  readonly wells: Registry<Well>;
}

export interface TopPick {
  readonly surface: string;
  readonly depth: number;
}

// =============================================================================
// Configuration Types
// =============================================================================

export type StatisticsModeSetting = 'auto' | CalculationMode;

export type OutputFormat = 'json' | 'markdown';

export interface DepthstatConfig {
  readonly nullValue: number;
  readonly statistics: {
    readonly mode: StatisticsModeSetting;
  };
  readonly grouping: {
    readonly alignment: AlignmentPolicy;
    readonly onEmptyGroup: EmptyGroupPolicy;
    readonly discreteResample: DiscreteResampleMethod;
  };
  readonly output: {
    readonly format: OutputFormat;
    readonly precision: number;
  };
}

// =============================================================================
// CLI Types
// =============================================================================

export interface StatsCommand {
  readonly command: 'stats';
  readonly dataset: string;
  readonly property: string;
  readonly well: string | null;
  readonly by: readonly string[];
  readonly mode: CalculationMode | null;
  readonly format: OutputFormat | null;
  readonly output: string | null;
}

export interface IntervalsCommand {
  readonly command: 'intervals';
  readonly dataset: string;
  readonly property: string;
  readonly well: string | null;
  readonly boundaries: readonly number[];
  readonly format: OutputFormat | null;
  readonly output: string | null;
}

export interface HelpCommand {
  readonly command: 'help';
  readonly subcommand: string | null;
}

export interface VersionCommand {
  readonly command: 'version';
}

export type Command = StatsCommand | IntervalsCommand | HelpCommand | VersionCommand;

// =============================================================================
// Error Types
// =============================================================================

export interface DegenerateGridError {
  readonly code: 'DEGENERATE_GRID';
  readonly message: string;
  readonly index: number | null;
  readonly depths: readonly number[];
}

export interface InvalidSeriesError {
  readonly code: 'INVALID_SERIES';
  readonly message: string;
  readonly series: string;
}

export interface DepthAlignmentError {
  readonly code: 'DEPTH_ALIGNMENT';
  readonly message: string;
  readonly series: string;
  readonly expected: ValueRange;
  readonly actual: ValueRange;
}

export interface InvalidClassifierError {
  readonly code: 'INVALID_CLASSIFIER';
  readonly message: string;
  readonly classifier: string;
  readonly kind: SeriesKind;
}

export interface EmptyGroupError {
  readonly code: 'EMPTY_GROUP';
  readonly message: string;
  readonly path: readonly GroupKey[];
  readonly indices: readonly number[];
}

export interface NotFoundError {
  readonly code: 'NOT_FOUND';
  readonly message: string;
  readonly kind: string;
  readonly key: string;
  readonly available: readonly string[];
}

export interface AmbiguousSeriesError {
  readonly code: 'AMBIGUOUS_SERIES';
  readonly message: string;
  readonly name: string;
  readonly sources: readonly string[];
}

export type SeriesError = DegenerateGridError | InvalidSeriesError;

export type GroupError =
  | SeriesError
  | DepthAlignmentError
  | InvalidClassifierError
  | EmptyGroupError;

export type ProjectError = GroupError | NotFoundError | AmbiguousSeriesError;

export interface UnmappedLabelWarning {
  readonly code: 'UNMAPPED_LABEL';
  readonly message: string;
  readonly classifier: string;
  readonly value: number;
  readonly fallback: string;
}

export interface EmptyGroupWarning {
  readonly code: 'EMPTY_GROUP_OMITTED';
  readonly message: string;
  readonly path: readonly GroupKey[];
  readonly indices: readonly number[];
}

export type StatsWarning = UnmappedLabelWarning | EmptyGroupWarning;

export type ParseErrorCode =
  | 'UNKNOWN_COMMAND'
  | 'MISSING_REQUIRED_ARG'
  | 'INVALID_ARG_VALUE';

export interface ParseError {
  readonly code: ParseErrorCode;
  readonly message: string;
  readonly arg?: string;
}

export type ConfigErrorCode =
  | 'CONFIG_INVALID'
  | 'CONFIG_LOAD_FAILED';

export interface ConfigError {
  readonly code: ConfigErrorCode;
  readonly message: string;
  readonly path?: string;
}

export type DatasetErrorCode =
  | 'DATASET_INVALID'
  | 'DATASET_LOAD_FAILED';

export interface DatasetError {
  readonly code: DatasetErrorCode;
  readonly message: string;
  readonly path?: string;
}
