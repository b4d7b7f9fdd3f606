/**
 * Zod validation schema for the loader's YAML config file
 */

import { z } from 'zod';
import { Format } from '../decoders/types.js';

export const ConfigFileSchema = z
  .object({
    directory: z.string().min(1).optional(),
    format: z.nativeEnum(Format).optional(),
    languages: z.array(z.string()).default([]),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
