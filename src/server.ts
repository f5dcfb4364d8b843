// src/server.ts

import { loadAppConfig, loadRulesOverrides } from './config/appConfig';
import { resolveRules } from './config/optimizationRules';
import { TransferRecord } from './models/TransferRecord';
import { loadFacilityRoster } from './engine/facilityRoster';
import { TransferDecisionEngine } from './engine/transferDecisionEngine';
import { createHighsBackend } from './engine/solvers/highsBackend';
import {
    ChatCompletionReasoningGenerator,
    ReasoningGenerator,
    TemplateReasoningGenerator
} from './reasoning/reasoningGenerator';
import { createApp } from './app';

async function main(): Promise<void> {
    const config = loadAppConfig();
    const overrides = config.rulesPath ? loadRulesOverrides(config.rulesPath) : {};
    const rules = resolveRules({
        ...overrides,
        ...(config.solverTimeLimitSeconds !== null ? { solverTimeLimitSeconds: config.solverTimeLimitSeconds } : {})
    });

    const roster = loadFacilityRoster(config.facilitiesPath);
    const records = new Map<string, TransferRecord>();
    const backend = await createHighsBackend({ timeLimitSeconds: rules.solverTimeLimitSeconds });

    const reasoningGenerator: ReasoningGenerator = config.reasoning.apiKey
        ? new ChatCompletionReasoningGenerator({
              apiKey: config.reasoning.apiKey,
              baseUrl: config.reasoning.baseUrl,
              model: config.reasoning.model,
              timeoutMs: config.reasoning.timeoutMs
          })
        : new TemplateReasoningGenerator();
    if (!config.reasoning.apiKey) {
        console.log('[Server] REASONING_API_KEY not set; using templated reasoning');
    }

    const engine = new TransferDecisionEngine(roster, {
        rules,
        backend,
        reasoningGenerator,
        mode: config.transportMode
    });

    const app = createApp({ roster, records, engine });
    app.listen(config.port, () => {
        console.log(`Transfer decision service running on port ${config.port}`);
    });
}

main().catch((error: unknown) => {
    console.error('Failed to start:', error instanceof Error ? error.message : error);
    process.exit(1);
});
