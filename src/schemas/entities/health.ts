import { z } from 'zod';

export const healthQuerySchema = z.object({
  echo: z.string().optional(),
});

export const healthParamSchema = z.object({
  pathEcho: z.string().optional(),
});
