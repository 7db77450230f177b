/**
 * Reference scenario: the "no new action" baseline of a solution.
 */

import { InvalidDefinitionError } from '../framework/errors.js';
import { AdoptionTrajectory } from './adoption.js';
import { Market } from './market.js';

export class ReferenceScenario {
  readonly name: string;
  readonly market: Market;
  readonly adoption: AdoptionTrajectory;

  constructor(name: string, market: Market, adoption: AdoptionTrajectory) {
    if (adoption.role !== 'REFERENCE') {
      throw new InvalidDefinitionError(adoption.name, [
        `reference scenario '${name}' needs a REFERENCE trajectory, got ${adoption.role}`,
      ]);
    }
    this.name = name;
    this.market = market;
    this.adoption = adoption;
    Object.freeze(this);
  }
}
