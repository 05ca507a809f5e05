/**
 * Evaluation settings.
 */
export interface EvaluateSettings {
  /** Log one line per materialization */
  verbose?: boolean;
  /** Where log lines go. Defaults to `console.log` */
  logger?: (message: string) => void;
}

/** Fill in defaults for any setting left out */
export function resolveSettings(settings: EvaluateSettings = {}): Required<EvaluateSettings> {
  return {
    verbose: settings.verbose ?? false,
    logger: settings.logger ?? ((message: string) => console.log(message)),
  };
}
