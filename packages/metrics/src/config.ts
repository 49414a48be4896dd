export type WorkingHoursConfig = {
  startHour: number;
  endHour: number;
};

export type CommitSizeConfig = {
  smallMax: number;
  mediumMax: number;
  largeMax: number;
};

export type FileChurnConfig = {
  highChurnThreshold: number;
  mediumChurnThreshold: number;
};

export type CoChangeConfig = {
  hotspotStrengthThreshold: number;
  hotspotMinPairs: number;
};

export type LeadTimeConfig = {
  flowEfficiencyThresholdHours: number;
  fastAuthorHours: number;
};

export type ReliabilityConfig = {
  highBugfixAuthorRatio: number;
  highRevertAuthorRatio: number;
  highRiskAuthorScore: number;
};

export type DeploymentConfig = {
  mainBranchNames: readonly string[];
};

export type MetricsConfig = {
  workingHours: WorkingHoursConfig;
  commitSize: CommitSizeConfig;
  fileChurn: FileChurnConfig;
  coChange: CoChangeConfig;
  reliability: ReliabilityConfig;
  leadTime: LeadTimeConfig;
  deployment: DeploymentConfig;
};

export type MetricsConfigOverrides = {
  [Section in keyof MetricsConfig]?: Partial<MetricsConfig[Section]>;
};

export const DEFAULT_METRICS_CONFIG: MetricsConfig = {
  // Working hours are [startHour, endHour), Monday to Friday.
  workingHours: {
    startHour: 9,
    endHour: 18,
  },
  // Inclusive upper bounds on additions + deletions; anything above largeMax is "huge".
  commitSize: {
    smallMax: 10,
    mediumMax: 100,
    largeMax: 500,
  },
  fileChurn: {
    highChurnThreshold: 1000,
    mediumChurnThreshold: 100,
  },
  coChange: {
    hotspotStrengthThreshold: 0.3,
    hotspotMinPairs: 3,
  },
  // Author thresholds are percentages, except risk which is a 0-100 score.
  reliability: {
    highBugfixAuthorRatio: 30,
    highRevertAuthorRatio: 5,
    highRiskAuthorScore: 20,
  },
  leadTime: {
    flowEfficiencyThresholdHours: 168,
    fastAuthorHours: 24,
  },
  deployment: {
    mainBranchNames: ["main", "master", "production", "prod"],
  },
};

export const mergeMetricsConfig = (overrides: MetricsConfigOverrides | undefined): MetricsConfig => {
  if (overrides === undefined) {
    return DEFAULT_METRICS_CONFIG;
  }

  return {
    workingHours: {
      ...DEFAULT_METRICS_CONFIG.workingHours,
      ...overrides.workingHours,
    },
    commitSize: {
      ...DEFAULT_METRICS_CONFIG.commitSize,
      ...overrides.commitSize,
    },
    fileChurn: {
      ...DEFAULT_METRICS_CONFIG.fileChurn,
      ...overrides.fileChurn,
    },
    coChange: {
      ...DEFAULT_METRICS_CONFIG.coChange,
      ...overrides.coChange,
    },
    reliability: {
      ...DEFAULT_METRICS_CONFIG.reliability,
      ...overrides.reliability,
    },
    leadTime: {
      ...DEFAULT_METRICS_CONFIG.leadTime,
      ...overrides.leadTime,
    },
    deployment: {
      ...DEFAULT_METRICS_CONFIG.deployment,
      ...overrides.deployment,
    },
  };
};
