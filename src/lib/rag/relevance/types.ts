/**
 * Relevance model contract.
 *
 * A relevance model is a cross-encoder: it reads the query and one passage
 * together and returns a relevance score (higher is more relevant).
 */

export interface RelevanceModel {
  /** Provider type identifier (e.g. 'tei') */
  readonly provider: string;
  readonly modelId: string;

  /**
   * Score every passage against the query.
   *
   * @returns one finite score per passage, in input order
   * @throws ModelUnavailableError when the backend fails or returns an unusable response
   */
  score(query: string, passages: string[]): Promise<number[]>;
}

export interface RelevanceModelConfig {
  modelId: string;
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
}
