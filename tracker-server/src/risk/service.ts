import type { PositionStore } from "../positions/store.js";
import type { Position } from "../positions/types.js";
import { buildMarketSnapshot, type MarketDataProvider } from "../market/market-data.js";
import { getRiskConfig, type RiskConfig } from "../utils/config.js";
import { computePortfolioRisk } from "./portfolio-risk.js";
import { computePositionRisk, type RiskContext } from "./position-risk.js";
import { BlackScholesModel, type PricingModel } from "./pricing.js";
import type { PortfolioRiskReport, PositionRiskReport } from "./types.js";

export interface RiskServiceOptions {
  store: PositionStore;
  marketData: MarketDataProvider;
  model?: PricingModel;
  config?: RiskConfig;
  clock?: () => Date;
}

/**
 * Loads positions and quotes, then hands a snapshot to the engine.
 */
export class RiskService {
  private readonly store: PositionStore;
  private readonly marketData: MarketDataProvider;
  private readonly model: PricingModel;
  private readonly config: RiskConfig;
  private readonly clock: () => Date;

  constructor(options: RiskServiceOptions) {
    this.store = options.store;
    this.marketData = options.marketData;
    this.model = options.model ?? new BlackScholesModel();
    this.config = options.config ?? getRiskConfig();
    this.clock = options.clock ?? (() => new Date());
  }

  /** Throws PositionNotFoundError for an unknown id. */
  async getPositionRisk(positionId: string): Promise<PositionRiskReport> {
    const position = await this.store.get(positionId);
    return computePositionRisk(position, await this.context([position]));
  }

  async getPortfolioRisk(): Promise<PortfolioRiskReport> {
    const positions = await this.store.listOpen();
    return computePortfolioRisk(positions, await this.context(positions));
  }

  private async context(positions: readonly Position[]): Promise<RiskContext> {
    return {
      now: this.clock(),
      market: await buildMarketSnapshot(this.marketData, positions.map((p) => p.symbol)),
      model: this.model,
      config: this.config,
    };
  }
}
