// src/validation/schemas.ts

import { z } from 'zod';
import { PatientAcuity } from '../models/Patient';
import { FacilityLevel } from '../models/Facility';
import { IncidentType, TransportMode } from '../models/Incident';

/**
 * Boundary schemas - HTTP bodies, roster file, rules file
 * The engine itself never re-validates
 */

const GeoLocationSchema = z.object({
    latitude: z.number().min(-90).max(90).nullable().optional(),
    longitude: z.number().min(-180).max(180).nullable().optional()
});

const CapabilityFlagsSchema = z.record(z.string(), z.boolean());
const ResourceQuantitiesSchema = z.record(z.string(), z.number());

export const PatientSchema = z.object({
    id: z.string().min(1),
    name: z.string().optional(),
    age: z.number().int().nonnegative().optional(),
    acuity: z.nativeEnum(PatientAcuity),
    location: GeoLocationSchema.nullable().optional(),
    predictedDeathAt: z.string().datetime({ offset: true }).nullable().optional(),
    deceased: z.boolean().optional(),
    requiredCapabilities: CapabilityFlagsSchema.nullable().optional(),
    requiredResources: z.record(z.string(), z.number().nonnegative()).nullable().optional()
});

export const FacilitySchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    level: z.nativeEnum(FacilityLevel),
    location: GeoLocationSchema.nullable().optional(),
    capabilities: CapabilityFlagsSchema.nullable().optional(),
    resources: ResourceQuantitiesSchema.nullable().optional(),
    acceptedPatients: z.array(z.string()).default([])
});

export const FacilityRosterSchema = z.array(FacilitySchema);

const IncidentTypeSchema = z.nativeEnum(IncidentType).default(IncidentType.MASS_CASUALTY_INCIDENT);

export const DecideRequestSchema = z.object({
    patient: PatientSchema,
    incidentType: IncidentTypeSchema
});

export const BatchRequestSchema = z.object({
    patients: z
        .array(PatientSchema)
        .min(1)
        .refine(patients => new Set(patients.map(p => p.id)).size === patients.length, {
            message: 'Patient ids must be unique within a batch'
        }),
    incidentType: IncidentTypeSchema
});

const EvacuationStageSchema = z.object({
    role: z.enum(['Role 1', 'Role 2', 'Role 3']),
    level: z.nativeEnum(FacilityLevel),
    deadlineMinutes: z.number().positive().nullable()
});

export const RulesOverridesSchema = z
    .object({
        acuityWeights: z.record(z.string(), z.number()),
        defaultAcuityWeight: z.number(),
        scarcityPenalties: z.record(z.string(), z.number()),
        acuityLevelScores: z.record(z.string(), z.record(z.coerce.number(), z.number())),
        capabilityCatalog: z.array(z.string()),
        resourceCatalog: z.array(z.string()),
        capabilityMismatchPenalty: z.number().nonnegative(),
        resourceDeficitPenalty: z.number().nonnegative(),
        resourceStressMultiplier: z.number().nonnegative(),
        resourceStressExponent: z.number(),
        transportSpeedsKmh: z
            .object({
                [TransportMode.GROUND]: z.number().positive(),
                [TransportMode.AIR]: z.number().positive()
            })
            .partial(),
        evacuationStages: z.array(EvacuationStageSchema).min(1),
        maxAlternatives: z.number().int().nonnegative(),
        defaultSurvivalWindowMinutes: z.number().positive(),
        solverTimeLimitSeconds: z.number().positive()
    })
    .partial()
    .strict();

/**
 * First issue as "path: message", for 400 responses and start-up errors
 */
export function formatZodError(error: z.ZodError): string {
    const issue = error.issues[0];
    if (!issue) {
        return 'Invalid input';
    }
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
}
