import { ProductionSimulator } from "../../app/ProductionSimulator";
import { SimulationParameters, SimulatorCallbacks } from "../../utils/shared";
import { createRandomSource, RandomSource } from "../../utils/random";


export class SimulationFactory {

  public static create(parameters: SimulationParameters, callbacks?: SimulatorCallbacks, random?: RandomSource): ProductionSimulator {
    return new ProductionSimulator({
      parameters,
      random: random ?? createRandomSource(parameters.seed),
      callbacks
    });
  }
}
