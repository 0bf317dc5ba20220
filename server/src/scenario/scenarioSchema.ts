import { z } from 'zod';

const teamNameSchema = z
  .string()
  .min(1)
  .max(48)
  .regex(/^[A-Za-z0-9][A-Za-z0-9 _.-]*$/, 'Team names may contain letters, digits, spaces, dot, dash and underscore');

export const teamSpecSchema = z.object({
  name: teamNameSchema,
  image: z.string().min(1),
  build: z
    .object({
      context: z.string().min(1),
      dockerfile: z.string().min(1).optional(),
    })
    .optional(),
  resources: z
    .object({
      cpus: z.number().positive().optional(),
      memoryMb: z.number().int().positive().optional(),
    })
    .default({}),
});

export const scenarioSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    teams: z.array(teamSpecSchema).min(1),
  })
  .superRefine((scenario, ctx) => {
    const seen = new Set<string>();
    scenario.teams.forEach((team, index) => {
      if (seen.has(team.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['teams', index, 'name'],
          message: `Duplicate team name '${team.name}'`,
        });
      }
      seen.add(team.name);
    });
  });
