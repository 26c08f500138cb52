/**
 * Configuration type definitions
 */

/**
 * Options for the inference layered onto library resolution
 */
export type InferenceOptions = {
  /** Follow imports and infer imported bindings from the imported unit */
  readonly inferTransitively: boolean;
  /** Only infer `const` declarations; anything else stays `unknown` */
  readonly onlyInferConstants: boolean;
};

/**
 * Mock runtime library contents, keyed by `rt:` identifier
 */
export type MockEnvironment = ReadonlyMap<string, string>;

/**
 * Environment description as supplied by a caller or a project file.
 * Every field is optional; validation fills in defaults and rejects
 * combinations that do not fit the selected modes.
 */
export type ConfigurationInput = {
  readonly useMockRuntime?: boolean;
  readonly runtimePath?: string;
  readonly mockRuntime?: MockEnvironment | Readonly<Record<string, string>>;
  readonly useImplicitEntry?: boolean;
  readonly entryPointFile?: string;
  readonly useMultiRoot?: boolean;
  readonly packageRoots?: readonly string[];
  readonly packageRoot?: string;
  readonly inference?: Partial<InferenceOptions>;
  readonly verbose?: boolean;
};

export type RuntimeConfiguration =
  | {
      readonly useMockRuntime: true;
      readonly mockRuntime: MockEnvironment;
    }
  | {
      readonly useMockRuntime: false;
      readonly runtimePath: string;
    };

export type PackageConfiguration =
  | {
      readonly useMultiRoot: true;
      readonly packageRoots: readonly string[];
    }
  | {
      readonly useMultiRoot: false;
      readonly packageRoot: string;
    };

export type EntryConfiguration =
  | {
      readonly useImplicitEntry: true;
      readonly entryPointFile: string;
    }
  | {
      readonly useImplicitEntry: false;
      readonly entryPointFile?: string;
    };

/**
 * Validated, immutable configuration. Paths are absolute.
 */
export type AnalysisConfiguration = RuntimeConfiguration &
  PackageConfiguration &
  EntryConfiguration & {
    readonly inference: InferenceOptions;
    readonly verbose: boolean;
  };
