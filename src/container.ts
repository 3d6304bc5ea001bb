/**
 * Composition root: builds the engine's object graph once from configuration.
 */

import type { Env } from "./config/env";
import type { Logger } from "./config/logger";
import { PromptChainExecutor } from "./services/chain/executor";
import { AnswerEvaluator } from "./services/evaluation/answerEvaluator";
import { FollowUpGenerator } from "./services/interviewer/followUp";
import { LlmResultCache } from "./services/llm/cache";
import type { LLMClient } from "./services/llm/types";
import { InterviewService } from "./services/orchestration/interviewService";
import type { SessionRepository } from "./services/persistence/types";
import { policyFromEnv } from "./services/report/hiring";
import { KeywordThemeClassifier } from "./services/report/themes";

export type Container = {
  executor: PromptChainExecutor;
  service: InterviewService;
  cache: LlmResultCache;
};

export type ContainerDeps = {
  config: Env;
  logger: Logger;
  llm: LLMClient;
  repository: SessionRepository;
  random?: () => number;
};

export function createContainer(deps: ContainerDeps): Container {
  const { config, logger } = deps;
  const cache = new LlmResultCache(config.LLM_CACHE_SIZE);
  const executor = new PromptChainExecutor(deps.llm, {
    logger,
    cache,
    retry: {
      maxAttempts: config.LLM_MAX_ATTEMPTS,
      baseDelayMs: config.LLM_RETRY_BASE_MS,
      timeoutMs: config.LLM_TIMEOUT_MS
    }
  });
  const service = new InterviewService({
    repository: deps.repository,
    executor,
    evaluator: new AnswerEvaluator({ executor, logger }),
    followUps: new FollowUpGenerator({ executor, logger, random: deps.random }),
    policy: policyFromEnv(config),
    classifier: new KeywordThemeClassifier(),
    logger
  });
  return { executor, service, cache };
}
