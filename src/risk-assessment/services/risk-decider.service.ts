import { Injectable, Logger } from '@nestjs/common';
import { RuleConfigService } from './rule-config.service';

export interface RiskTier {
  shouldTrade: boolean;
  riskPercent: number;
}

@Injectable()
export class RiskDeciderService {
  private readonly logger = new Logger(RiskDeciderService.name);

  constructor(private ruleConfig: RuleConfigService) {}

  /**
   * Three tiers: below no_trade stays out, below risk_2_percent risks 2%,
   * anything above risks 3%.
   */
  decide(finalScore: number): RiskTier {
    const { noTrade, risk2Percent } = this.ruleConfig.scoreThresholds();

    if (finalScore < noTrade) {
      return { shouldTrade: false, riskPercent: 0 };
    }
    if (finalScore < risk2Percent) {
      return { shouldTrade: true, riskPercent: 2 };
    }
    return { shouldTrade: true, riskPercent: 3 };
  }

  /**
   * Lots for a given risk. Balance and stop distance must be positive;
   * callers validate that before getting here.
   */
  lotSize(riskPercent: number, balance: number, slPips: number, instrument: string): number {
    const pipValue = this.ruleConfig.pipValue(instrument);
    const { minLotSize, maxLotSize } = this.ruleConfig.lotLimits();

    const riskAmount = balance * (riskPercent / 100);
    const rawLotSize = riskAmount / (slPips * pipValue);
    const clamped = Math.max(minLotSize, Math.min(maxLotSize, rawLotSize));
    const lotSize = Math.round(clamped * 100) / 100;

    this.logger.debug(
      `Lot sizing: risk=${riskAmount.toFixed(2)}, pipValue=${pipValue}, ` +
        `raw=${rawLotSize.toFixed(4)}, final=${lotSize}`,
    );

    return lotSize;
  }
}
