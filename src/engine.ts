/**
 * Wires the measurement services onto one set of repositories.
 */

import type { Repositories } from "./repositories/types.ts";
import type { InformationModelName } from "./schemas/measurement.ts";
import { AdaptiveEngine } from "./services/adaptive-engine.ts";
import { FixedFormService } from "./services/fixed-form-service.ts";
import { getInformationModel } from "./services/information-models.ts";
import { ItemQualityAnalyzer } from "./services/item-quality-analyzer.ts";
import { ItemSelector } from "./services/item-selector.ts";
import { QualityFlagController } from "./services/quality-flag-controller.ts";
import { ReliabilityEstimator } from "./services/reliability-estimator.ts";
import { ReportAggregator } from "./services/report-aggregator.ts";
import { SessionLock } from "./services/session-lock.ts";

export interface EngineSettings {
  reliabilityCacheTtlMs?: number;
  seThreshold?: number;
  maxItems?: number;
  informationModel?: InformationModelName;
  minResponses?: number;
  now?: () => Date;
}

export interface Engine {
  repositories: Repositories;
  analyzer: ItemQualityAnalyzer;
  flags: QualityFlagController;
  reliability: ReliabilityEstimator;
  selector: ItemSelector;
  adaptive: AdaptiveEngine;
  fixedForm: FixedFormService;
  reports: ReportAggregator;
  lock: SessionLock;
}

export function createEngine(repositories: Repositories, settings: EngineSettings = {}): Engine {
  const now = settings.now ?? (() => new Date());
  const { items, responses, sessions, metrics } = repositories;

  const analyzer = new ItemQualityAnalyzer(
    { items, responses },
    { minResponses: settings.minResponses },
  );
  const flags = new QualityFlagController(
    { items, analyzer, now },
    { minResponses: settings.minResponses },
  );
  const reliability = new ReliabilityEstimator(
    { responses, metrics, now: () => now().getTime() },
    { cacheTtlMs: settings.reliabilityCacheTtlMs },
  );
  const selector = new ItemSelector({
    model: getInformationModel(settings.informationModel ?? "2pl"),
  });
  // Adaptive and fixed-form sessions share one lock so a session id is never
  // updated by both at once
  const lock = new SessionLock();

  const adaptive = new AdaptiveEngine(
    { items, responses, sessions, selector, reliability, flags, lock, now },
    { seThreshold: settings.seThreshold, maxItems: settings.maxItems },
  );
  const fixedForm = new FixedFormService({ items, sessions, selector, reliability, flags, lock, now });
  const reports = new ReportAggregator({ items, metrics, reliability, flags, now });

  return { repositories, analyzer, flags, reliability, selector, adaptive, fixedForm, reports, lock };
}
