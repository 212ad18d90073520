export interface ISentimentScore {
  readonly score: number;
  readonly sampleSize: number;
}

export interface ISentimentSource {
  getScore(subnetId: number): Promise<ISentimentScore>;
}
