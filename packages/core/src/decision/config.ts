export interface DecisionConfig {
  /** Score margins within this band (inclusive) are inconclusive. */
  tieBand: number;
  /** Margin at which a verdict is reported with high confidence. */
  highConfidenceMargin: number;
  /** Satellites beyond the tipping point that count as "well above" it. */
  tippingPointComfortMargin: number;
  /** Fixed deduction for routing and acquisition overhead of crosslinks. */
  crosslinkComplexityPenalty: number;
}

export const DEFAULT_DECISION_CONFIG: DecisionConfig = {
  tieBand: 2,
  highConfidenceMargin: 4,
  tippingPointComfortMargin: 5,
  crosslinkComplexityPenalty: 1,
};
