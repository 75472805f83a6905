/**
 * Technology Signatures
 *
 * Loads the signature table from data/signatures.json and validates it
 * once at module load. A signature matches when any content pattern is a
 * substring of the lowercased page, or any header pattern is a substring
 * of a header name or value.
 *
 * @module technographics/signatures
 */

import { z } from 'zod';
import signatureData from './data/signatures.json';
import { TechCategorySchema } from './contracts/tech-signals';

// ===========================================
// Schemas
// ===========================================

const TechSignatureSchema = z.object({
  name: z.string().min(1),
  category: TechCategorySchema,
  patterns: z.array(z.string()),
  headers: z.array(z.string()),
});

export type TechSignature = z.infer<typeof TechSignatureSchema>;

const ScriptLibrarySchema = z.object({
  name: z.string().min(1),
  pattern: z.string().min(1),
  category: TechCategorySchema.optional(),
});

export type ScriptLibrary = z.infer<typeof ScriptLibrarySchema>;

const SignatureTableSchema = z.object({
  technologies: z.array(TechSignatureSchema),
  aws_services: z.record(z.string(), z.array(z.string())),
  meta_generators: z.array(z.string()),
  script_libraries: z.array(ScriptLibrarySchema),
});

export type SignatureTable = z.infer<typeof SignatureTableSchema>;

// ===========================================
// Table
// ===========================================

export const SIGNATURES: SignatureTable = SignatureTableSchema.parse(signatureData);

/** Frontend frameworks that count as a modern, cloud-ready stack */
export const MODERN_FRONTEND_FRAMEWORKS: readonly string[] = ['react', 'angular', 'vue'];

/** Technology name of the target cloud provider */
export const TARGET_PROVIDER = 'aws';
