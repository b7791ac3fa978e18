/** Compresses a task result into a short summary for later steps. */
export interface ResultSummarizer {
  summarize(text: string): Promise<string>
}
