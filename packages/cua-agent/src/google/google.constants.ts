export interface GoogleModel {
  alias: 'flash' | 'pro';
  name: string;
  title: string;
  contextWindow: number;
}

export const GOOGLE_MODELS: GoogleModel[] = [
  {
    alias: 'flash',
    name: 'gemini-2.5-flash',
    title: 'Gemini 2.5 Flash',
    contextWindow: 1048576,
  },
  {
    alias: 'pro',
    name: 'gemini-2.5-pro',
    title: 'Gemini 2.5 Pro',
    contextWindow: 1048576,
  },
];

export const DEFAULT_MODEL = GOOGLE_MODELS[0];

export const DEFAULT_MAX_OUTPUT_TOKENS = 8192;
export const DEFAULT_THINKING_BUDGET = 8192;

export const MODEL_RATE_LIMIT_MESSAGE =
  'API rate limit exceeded - please wait 1 minute and retry';

/** Maps `flash`/`pro` to a model id; anything else is taken as an id. */
export function resolveModelName(model: string): string {
  const known = GOOGLE_MODELS.find(
    (candidate) => candidate.alias === model.toLowerCase(),
  );
  return known ? known.name : model;
}
