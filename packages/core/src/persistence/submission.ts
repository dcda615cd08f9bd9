import type { ContentItem } from '../domain/content';
import { AlertSeverity } from '../domain/enums';
import { ReviewWorkflowConfig, parseWorkflowConfig } from '../config/workflow-config';
import { ConfigError } from '../errors';
import type { OperatorAlerter } from '../collaborators';
import type { ContentItemRepository } from './content-items';
import {
  WorkflowInstanceRecord,
  WorkflowInstanceRepository,
  instanceIdFor,
} from './workflow-instances';

export interface ReviewRegistrationStores {
  contentItems: ContentItemRepository;
  instances: WorkflowInstanceRepository;
  alerter?: OperatorAlerter;
}

async function parseOrAlert(
  contentItemId: string,
  configInput: unknown,
  alerter?: OperatorAlerter
): Promise<ReviewWorkflowConfig> {
  try {
    return parseWorkflowConfig(configInput ?? {});
  } catch (error) {
    if (error instanceof ConfigError && alerter) {
      await alerter.raise({
        severity: AlertSeverity.WARNING,
        kind: 'invalid_config',
        contentItemId,
        message: error.message,
        details: { issues: error.issues },
      });
    }
    throw error;
  }
}

/**
 * Validates the configuration, stores the item and creates its `Created`
 * instance. Idempotent on the item id: a repeated submission returns the
 * existing instance. An invalid configuration creates nothing.
 */
export async function registerReview(
  stores: ReviewRegistrationStores,
  contentItem: ContentItem,
  configInput?: unknown
): Promise<{ record: WorkflowInstanceRecord; created: boolean }> {
  const config = await parseOrAlert(contentItem.id, configInput, stores.alerter);

  const existing = await stores.instances.findByContentItemId(contentItem.id);
  if (existing) {
    return { record: existing, created: false };
  }

  await stores.contentItems.insert(contentItem);
  return stores.instances.create({ id: instanceIdFor(contentItem.id), contentItem, config });
}
