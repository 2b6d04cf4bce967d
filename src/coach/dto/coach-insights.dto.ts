export interface CoachInsights {
  inactivityWarning?: string;
  psychologyInsight?: string;
  riskTakingInsight?: string;
  scoreTrendInsight?: string;
  hardStopInsight?: string;
  dailyMotivation: string;
  generatedAt: string;
}
