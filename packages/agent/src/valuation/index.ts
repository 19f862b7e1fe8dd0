import type { Config } from "../config.js";
import { ConstantValuationModel } from "./constant-model.js";
import { EmpiricalValuationModel } from "./empirical-model.js";
import { OuValuationModel } from "./ou-model.js";
import type { ValuationModel } from "./types.js";

export type { ValuationModel } from "./types.js";
export { PriceHistory } from "./price-history.js";
export { OuValuationModel, fitOu } from "./ou-model.js";
export { ConstantValuationModel } from "./constant-model.js";
export { EmpiricalValuationModel } from "./empirical-model.js";

export function createValuationModel(
  config: Pick<Config, "valuationModel" | "minHistory" | "ouHorizonMs" | "constantFairValue">,
): ValuationModel {
  switch (config.valuationModel) {
    case "ou":
      return new OuValuationModel(config.minHistory, config.ouHorizonMs);
    case "empirical":
      return new EmpiricalValuationModel(config.minHistory);
    case "constant":
      return new ConstantValuationModel(config.constantFairValue, {}, config.minHistory);
  }
}
