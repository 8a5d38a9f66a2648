export type ProfileMetricType = "timing" | "counter";

export type ProfileMetricPattern = {
  /** Exact printable string searched for in the dump. */
  pattern: string;
  key: string;
  unit: string;
  type: ProfileMetricType;
};

export type ProfileExtractionDetail = {
  pattern: string;
  key: string;
  value: number;
  stringPosition: number;
  offsetUsed: number;
  extractionPosition: number;
  unit: string;
  type: ProfileMetricType;
};

export type ProfilingReport = {
  fileInfo: {
    path: string;
    sizeBytes: number;
    backendVersion: string;
    graphName: string;
  };
  extraction: {
    stringsFound: number;
    metricsExtracted: number;
    failedExtractions: string[];
  };
  metrics: Record<string, number>;
  details: ProfileExtractionDetail[];
};

export type DerivedMetrics = Record<string, number>;
