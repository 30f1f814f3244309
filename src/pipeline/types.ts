export type NormalizedItem = {
  readonly id: string;
  readonly title: string;
  readonly summary: string;
  readonly authors: ReadonlyArray<string>;
  readonly category: string;
  readonly publishedAt: Date | null;
  readonly url: string;
};

export type Candidate = NormalizedItem & {
  readonly educational: boolean;
};

export type TopicResult = {
  readonly name: string;
  readonly recent: ReadonlyArray<Candidate>;
  readonly educational: ReadonlyArray<Candidate>;
};

export type CandidatePartition = {
  readonly recent: ReadonlyArray<Candidate>;
  readonly educational: ReadonlyArray<Candidate>;
};

export type CandidateWindow = {
  readonly stateCutoff: Date;
  readonly recentCutoff: Date;
  readonly candidateCutoff: Date;
};

/** Source of uniformly distributed numbers in [0, 1). */
export type Random = () => number;

export type Clock = () => Date;
