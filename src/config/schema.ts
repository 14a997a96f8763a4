import { z } from 'zod';

export const fettersConfigSchema = z.object({
  current_sprint_name: z.string().default(''),
});

export type FettersConfig = z.infer<typeof fettersConfigSchema>;

export const DEFAULT_CONFIG: FettersConfig = {
  current_sprint_name: '',
};
