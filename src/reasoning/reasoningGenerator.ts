// src/reasoning/reasoningGenerator.ts

import { z } from 'zod';
import { Patient } from '../models/Patient';
import { Facility } from '../models/Facility';
import { IncidentType } from '../models/Incident';
import { DecisionMode, FacilityChoice } from '../models/Decision';

/**
 * Everything the prose is allowed to talk about
 * The decision is already made when this is built
 */
export interface ReasoningContext {
    patient: Patient;
    incidentType: IncidentType;
    mode: DecisionMode;
    destination: Facility;
    etaMinutes: number;          // Total chain time in chain mode
    distanceKm: number;
    alternatives: FacilityChoice[];
    solverStatus: string;
    chainLength?: number;
}

/**
 * Advisory text collaborator - never on the critical path
 * Implementations must resolve (never reject) and fall back to templateReasoning
 */
export interface ReasoningGenerator {
    generate(context: ReasoningContext): Promise<string>;
}

export function templateReasoning(context: ReasoningContext): string {
    if (context.mode === DecisionMode.EVACUATION_CHAIN) {
        return `NATO-compliant evacuation chain constructed (${context.chainLength ?? 0} facilities, total time: ${context.etaMinutes.toFixed(1)} min)`;
    }
    return `Optimal facility selected using constraint optimization (ETA: ${context.etaMinutes.toFixed(1)} min)`;
}

/**
 * Used when no text-generation endpoint is configured
 */
export class TemplateReasoningGenerator implements ReasoningGenerator {
    async generate(context: ReasoningContext): Promise<string> {
        return templateReasoning(context);
    }
}

export interface ChatCompletionReasoningOptions {
    apiKey: string;
    baseUrl: string;
    model: string;
    timeoutMs: number;
}

const ChatCompletionResponseSchema = z.object({
    choices: z
        .array(
            z.object({
                message: z
                    .object({
                        content: z.string().nullable().optional()
                    })
                    .optional()
            })
        )
        .optional()
});

function humanize(key: string): string {
    return key
        .split('_')
        .map(word => word.charAt(0).toUpperCase() + word.slice(1))
        .join(' ');
}

function listFlags(flags: Partial<Record<string, boolean>> | null | undefined, empty: string): string {
    const names = Object.entries(flags ?? {})
        .filter(([, enabled]) => enabled === true)
        .map(([name]) => `  - ${humanize(name)}`);
    return names.length > 0 ? names.join('\n') : `  - ${empty}`;
}

function listQuantities(quantities: Partial<Record<string, number>> | null | undefined, empty: string): string {
    const entries = Object.entries(quantities ?? {})
        .filter(([, qty]) => typeof qty === 'number' && qty > 0)
        .map(([name, qty]) => `  - ${humanize(name)}: ${qty}`);
    return entries.length > 0 ? entries.join('\n') : `  - ${empty}`;
}

export function buildReasoningPrompt(context: ReasoningContext): string {
    const { patient, destination } = context;
    const location =
        typeof patient.location?.latitude === 'number' && typeof patient.location?.longitude === 'number'
            ? `${patient.location.latitude.toFixed(4)}, ${patient.location.longitude.toFixed(4)}`
            : 'Unknown';
    const alternatives =
        context.alternatives.length > 0
            ? context.alternatives
                  .map((alt, i) => `${i + 1}. ${alt.facilityName} - ETA: ${alt.etaMinutes.toFixed(1)} min`)
                  .join('\n')
            : 'No viable alternatives found';

    return [
        'You are a medical transfer coordinator explaining a facility selection that has already been made.',
        '',
        '## Patient',
        `Name: ${patient.name ?? 'Unknown'}`,
        `Age: ${patient.age ?? 'Unknown'}`,
        `Acuity (SALT): ${patient.acuity}`,
        `Location: ${location}`,
        'Required capabilities:',
        listFlags(patient.requiredCapabilities, 'None specified'),
        'Required resources:',
        listQuantities(patient.requiredResources, 'None specified'),
        '',
        '## Selected destination',
        `Facility: ${destination.name}`,
        `Level: ${destination.level} (1=Definitive Care, 2=Advanced Trauma, 3=Initial Stabilization)`,
        `ETA: ${context.etaMinutes.toFixed(1)} minutes`,
        `Distance: ${context.distanceKm.toFixed(2)} km`,
        'Available capabilities:',
        listFlags(destination.capabilities, 'None'),
        'Available resources:',
        listQuantities(destination.resources, 'None'),
        '',
        '## Alternatives considered',
        alternatives,
        '',
        '## Optimization',
        `Incident type: ${context.incidentType}`,
        `Decision mode: ${context.mode}`,
        `Solver status: ${context.solverStatus}`,
        'Minimized: time cost (ETA x acuity weight), capability mismatch, resource stress, stewardship of scarce capabilities.',
        '',
        'Write 2-3 short paragraphs in a professional tone for emergency coordinators covering medical match,',
        'proximity versus alternatives, resource stewardship and patient acuity. Reference the actual figures.'
    ].join('\n');
}

/**
 * OpenAI-compatible chat-completions client (OpenRouter by default)
 *
 * Any failure (HTTP error, timeout, empty content) is logged and degrades to
 * the templated sentence.
 */
export class ChatCompletionReasoningGenerator implements ReasoningGenerator {
    private options: ChatCompletionReasoningOptions;

    constructor(options: ChatCompletionReasoningOptions) {
        this.options = options;
    }

    async generate(context: ReasoningContext): Promise<string> {
        try {
            return await this.request(context);
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.warn(`[ReasoningGenerator] Falling back to template: ${message}`);
            return templateReasoning(context);
        }
    }

    private async request(context: ReasoningContext): Promise<string> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

        try {
            const response = await fetch(`${this.options.baseUrl}/chat/completions`, {
                method: 'POST',
                headers: {
                    Authorization: `Bearer ${this.options.apiKey}`,
                    'Content-Type': 'application/json'
                },
                body: JSON.stringify({
                    model: this.options.model,
                    temperature: 0.3,
                    max_tokens: 1000,
                    messages: [{ role: 'user', content: buildReasoningPrompt(context) }]
                }),
                signal: controller.signal
            });

            if (!response.ok) {
                const errorBody = await response.text();
                throw new Error(`Reasoning API ${response.status}: ${errorBody || 'request failed'}`);
            }

            const parsed = ChatCompletionResponseSchema.safeParse(await response.json());
            if (!parsed.success) {
                throw new Error('Reasoning API returned an unexpected payload');
            }

            const content = parsed.data.choices?.[0]?.message?.content?.trim();
            if (!content) {
                throw new Error('Reasoning API returned empty content');
            }
            return content;
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new Error('Reasoning request timed out');
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
        }
    }
}
