/**
 * @fileoverview Module Enablers - Turn On Provides and Topics
 *
 * @packageDocumentation
 * @module @wireloom/core/application/services
 * @license Apache-2.0
 *
 * ## Hexagonal Architecture Layer: APPLICATION
 *
 * Both enablers are idempotent and share one {@link AnalysisTable} per
 * locator. Enable modules before registering services so that classes
 * carrying only static provider members are accepted.
 *
 * @example
 * ```typescript
 * const locator = new ServiceLocator();
 * enableProvides(locator);
 * enableTopics(locator);
 * new ServiceCollection().addClass(Pools).applyTo(locator);
 * ```
 *
 * @version 1.0.0
 */

import { type IServiceLocator, DYNAMIC_CONFIGURATION_SERVICE } from '../../domain';
import { addClasses } from '../../infrastructure/di/dynamic-configuration';
import { TopicDescriptor } from '../../infrastructure/messaging/topic';
import { TopicDistributionService } from '../../infrastructure/messaging/topic-distribution-service';
import { AnalysisTable } from '../../infrastructure/provides/analysis-table';
import { ProvidesEnabler } from '../../infrastructure/provides/provides-enabler';

/**
 * Register provider members of every current and future service.
 */
export function enableProvides(locator: IServiceLocator): void {
  addClasses(locator, true, AnalysisTable, ProvidesEnabler);
}

/**
 * Deliver published messages to message receivers, and make `Topic`
 * injectable.
 */
export function enableTopics(locator: IServiceLocator): void {
  addClasses(locator, true, AnalysisTable, TopicDistributionService);

  if (locator.getDescriptors((descriptor) => descriptor instanceof TopicDescriptor).length === 0) {
    const configuration = locator.getService(DYNAMIC_CONFIGURATION_SERVICE).createDynamicConfiguration();
    configuration.addActiveDescriptor(new TopicDescriptor(locator));
    configuration.commit();
  }
}
