import { z } from 'zod';

const locationList = z.union([z.string(), z.array(z.string())]).transform((value) =>
  typeof value === 'string' ? value.split(/\s+/).filter((entry) => entry.length > 0) : value
);

/** Shape of one config file on disk; every key is optional. */
export const ConfigFileSchema = z
  .object({
    repositories: z.record(locationList).optional(),
    mainline_tags: z.record(z.string()).optional(),
    contact: z
      .object({
        name: z.string().min(1).optional(),
        email: locationList.optional(),
      })
      .optional(),
    format: z
      .object({
        number_width: z.number().int().min(1).max(9).optional(),
        not_in_mainline: z.string().min(1).optional(),
        queued: z.string().min(1).optional(),
        max_name_length: z.number().int().min(8).optional(),
      })
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
