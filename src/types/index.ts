export type ErrorCategory =
  | 'rate_limit'
  | 'network_timeout'
  | 'network_error'
  | 'not_found'
  | 'invalid_metadata'
  | 'api_error';

export interface ExtensionRef {
  /** Lower-cased `publisher.name`. */
  id: string;
  publisher: string;
  name: string;
  version: string;
  displayName?: string | undefined;
  installedAt?: string | undefined;
}

export interface PublisherInfo {
  id: string | null;
  name: string | null;
  verified: boolean;
  domain: string | null;
}

export interface ExtensionMetadata {
  name: string | null;
  version: string | null;
  displayName: string | null;
  description: string | null;
  publisher: PublisherInfo;
  repositoryUrl: string | null;
  homepageUrl: string | null;
  license: string | null;
  keywords: string[];
  categories: string[];
  statistics: {
    installs: number | null;
    rating: number | null;
    ratingCount: number | null;
  };
  lastUpdated: string | null;
}

export interface SecurityDetails {
  score: number | null;
  riskLevel: string | null;
  scoreContributions: Record<string, number | null>;
  moduleRiskLevels: Record<string, string | null>;
  notes: string[];
}

export interface VulnerabilityCounts {
  total: number;
  critical: number;
  high: number;
  moderate: number;
  low: number;
  info: number;
}

export interface DependencyInfo {
  name: string | null;
  version: string | null;
  type: string | null;
  risk: string | null;
  reason: string | null;
  vulnerabilityCount: number;
}

export interface DependencySummary {
  totalCount: number;
  runtimeCount: number;
  devCount: number;
  withVulnerabilities: number;
  highRiskCount: number;
  mediumRiskCount: number;
  lowRiskCount: number;
  vulnerabilities: VulnerabilityCounts;
  list: DependencyInfo[];
}

export interface RiskFactor {
  type: string | null;
  description: string | null;
  severity: string | null;
}

export interface ScanResult {
  publisher: string;
  name: string;
  analysisId: string;
  metadata: ExtensionMetadata;
  security: SecurityDetails;
  dependencies: DependencySummary;
  riskFactors: RiskFactor[];
  securityScore: number | null;
  riskLevel: string | null;
  vulnerabilities: VulnerabilityCounts;
  analysisTimestamp: string | null;
  hasErrors: boolean;
  reportUrl: string;
}

export type ScanOutcome =
  | { status: 'success'; result: ScanResult }
  | { status: 'error'; reason: string; errorType: ErrorCategory }
  | { status: 'not-found'; reason: string };

export type ItemOutcome = ScanOutcome & {
  extension: ExtensionRef;
  index: number;
  fromCache: boolean;
  cachedAt?: string | undefined;
};

export interface RetryStats {
  totalRetries: number;
  successfulRetries: number;
  failedAfterRetries: number;
  totalWorkflowRetries: number;
  successfulWorkflowRetries: number;
  failedAfterWorkflowRetries: number;
}

export interface FailedExtension {
  id: string;
  name: string;
  errorType: ErrorCategory;
  errorMessage: string;
}

export interface ScanRunStats {
  total: number;
  cacheHits: number;
  freshScans: number;
  errors: number;
  vulnerabilitiesFound: number;
  failedExtensions: FailedExtension[];
  retry: RetryStats;
  durationMs: number;
}
