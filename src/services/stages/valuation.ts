/**
 * Valuation Stage
 *
 * No market data provider is wired in yet; the valuator returns a fixed
 * placeholder value.
 */

import type {
  ClaimEntities,
  DamageContext,
  Valuation,
  ValuationContext,
} from "../../types/claim-context.js";
import { extendContext } from "../claim-context.js";
import {
  PipelineStage,
  type StageDependencies,
  type StageOptions,
  type StageOutcome,
} from "./stage.js";

export type VehicleValuator = (entities: ClaimEntities) => Valuation;

export const PLACEHOLDER_MARKET_SOURCE = "Placeholder (no market data provider configured)";

export const placeholderValuation: VehicleValuator = (entities) => ({
  vehicleValue: 25000.0,
  vehicleInfo: entities.vehicleInfo ?? "Unknown",
  marketSource: PLACEHOLDER_MARKET_SOURCE,
  confidence: 0.8,
});

export class ValuationStage extends PipelineStage<DamageContext, ValuationContext> {
  readonly name = "valuation" as const;
  readonly action = "get_valuation";

  private valuator: VehicleValuator;

  constructor(
    deps: StageDependencies,
    options: StageOptions = {},
    valuator: VehicleValuator = placeholderValuation
  ) {
    super(deps, options);
    this.valuator = valuator;
  }

  protected async run(context: DamageContext): Promise<StageOutcome<ValuationContext>> {
    const valuation = this.valuator(context.entities);

    return {
      status: "success",
      context: extendContext(context, { valuation }),
      details: { ...valuation },
    };
  }
}
