import { z } from 'zod';

// Runtime shapes for JSON that crosses a trust boundary: the catalog file on
// disk, uploaded fragments and form submissions posted to the API.  Unknown
// keys on records are kept so that a load/save cycle never drops data.

const text = z.string().nullish();
const measurement = z.union([z.number(), z.string()]).nullish();

export const ComponentSchema = z
  .object({
    description: text,
    section: text,
    steel: text,
    pressure: measurement,
    temperature: measurement,
    outerDiameter: measurement,
    wallThickness: measurement,
    notes: text,
  })
  .passthrough();

const surfaceFields = {
  aliases: z.array(z.string()).optional(),
  steel: text,
  pressure: measurement,
  temperature: measurement,
  outerDiameter: measurement,
  wallThickness: measurement,
  loadCondition: text,
  notes: text,
  category: text,
  system: text,
  section: text,
  surface_group: text,
  components: z.array(ComponentSchema).optional(),
};

const boilerFields = {
  name: text,
  station: text,
  boilerType: text,
  location: text,
  notes: text,
  parameters: z
    .union([z.string(), z.record(z.union([z.string(), z.number(), z.null()]))])
    .nullish(),
};

export const SurfaceSchema = z.object({ name: z.string(), ...surfaceFields }).passthrough();

export const BoilerSchema = z
  .object({ id: z.string().min(1), ...boilerFields, surfaces: z.array(SurfaceSchema).default([]) })
  .passthrough();

export const CatalogSchema = z.object({ boilers: z.array(BoilerSchema) }).passthrough();

export const UploadedSurfaceSchema = z.object({ name: text, ...surfaceFields }).passthrough();

export const UploadedBoilerSchema = z
  .object({ id: text, ...boilerFields, surfaces: z.array(UploadedSurfaceSchema).default([]) })
  .passthrough();

export const UploadedCatalogSchema = z.object({ boilers: z.array(UploadedBoilerSchema) }).passthrough();

// ─── API payloads ─────────────────────────────────────────────────────────────

const formText = z.string().optional();
const formMeasurement = z.union([z.number(), z.string(), z.null()]).optional();

export const SurfaceFormInputSchema = z.object({
  name: z.string(),
  aliases: formText,
  steel: formText,
  pressure: formMeasurement,
  temperature: formMeasurement,
  outerDiameter: formMeasurement,
  wallThickness: formMeasurement,
  loadCondition: formText,
  category: formText,
  system: formText,
  section: formText,
  surfaceGroup: formText,
  notes: formText,
});

export const BoilerFormInputSchema = z.object({
  id: z.string(),
  name: formText,
  station: formText,
  boilerType: formText,
  location: formText,
  parameters: formText,
  notes: formText,
});

export const SurfaceSubmissionSchema = z.object({
  target: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('existing'), boilerId: z.string() }),
    z.object({ kind: z.literal('new'), boiler: BoilerFormInputSchema }),
  ]),
  surface: SurfaceFormInputSchema,
});

/** Formats the first issue of a failed parse as "path: message". */
export function describeIssue(error: z.ZodError): string {
  const [issue] = error.issues;
  if (!issue) return 'Invalid data';
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${path}: ${issue.message}`;
}
