/**
 * Zod Validation Schemas - Duty Rota Service
 *
 * Runtime validation for API request bodies and query strings.
 * Rota rules (weekday of a slot, cycle limits, ownership) are checked by
 * the services; these schemas only guarantee shape.
 */

import { z } from 'zod';
import { isIsoDate } from '../lib/dates';
import { ROTA_DOMAINS } from './entities';

/**
 * Common validation patterns
 */
const uuidSchema = z.string().uuid('Invalid UUID format');
const nonEmptyString = z.string().trim().min(1, 'Cannot be empty');
const optionalText = (max: number) => z.string().trim().max(max).nullable().optional();

export const calendarDateSchema = z
  .string()
  .refine(isIsoDate, { message: 'Date must be a valid YYYY-MM-DD calendar date' });

export const rotaDomainSchema = z.enum(['collaborator', 'technician'], {
  errorMap: () => ({ message: `Domain must be one of: ${ROTA_DOMAINS.join(', ')}` }),
});

export const slotTypeSchema = z.enum([
  'SABADO_TARDE1',
  'SABADO_TARDE2',
  'DOMINGO_MANHA',
  'DOMINGO_TARDE1',
  'DOMINGO_TARDE2',
  'SABADO_DUPLA',
  'DOMINGO_AVULSO',
]);

export const weekdaySchema = z.enum(['SAB', 'DOM'], {
  errorMap: () => ({ message: 'Weekday must be "SAB" or "DOM"' }),
});

/**
 * POST /schedules/generate
 */
export const generateScheduleRequestSchema = z.object({
  domain: rotaDomainSchema,
  startDate: calendarDateSchema.optional(),
  cycleCount: z.number().int('Cycle count must be a whole number').optional(),
  dryRun: z.boolean().optional().default(false),
});

/**
 * POST /shifts
 */
export const createShiftRequestSchema = z.object({
  domain: rotaDomainSchema,
  date: calendarDateSchema,
  slotType: slotTypeSchema,
  personId: uuidSchema,
  partnerId: uuidSchema.nullable().optional(),
  notes: optionalText(500),
});

/**
 * PATCH /shifts/{shiftId}
 */
export const updateShiftRequestSchema = z
  .object({
    date: calendarDateSchema.optional(),
    slotType: slotTypeSchema.optional(),
    personId: uuidSchema.optional(),
    partnerId: uuidSchema.nullable().optional(),
    notes: optionalText(500),
    version: z.number().int().min(1),
  })
  .refine(
    (body) =>
      body.date !== undefined ||
      body.slotType !== undefined ||
      body.personId !== undefined ||
      body.partnerId !== undefined ||
      body.notes !== undefined,
    { message: 'At least one field must be provided for update' }
  );

/**
 * PUT /shifts/{shiftId}/owner
 */
export const reassignShiftRequestSchema = z.object({
  personId: uuidSchema,
  version: z.number().int().min(1),
});

/**
 * GET /shifts and GET /shifts/export query string
 */
export const listShiftsQuerySchema = z
  .object({
    domain: rotaDomainSchema.optional(),
    from: calendarDateSchema.optional(),
    to: calendarDateSchema.optional(),
    personId: uuidSchema.optional(),
    weekday: weekdaySchema.optional(),
  })
  .refine((query) => !query.from || !query.to || query.from <= query.to, {
    message: '"from" must not be after "to"',
    path: ['to'],
  });

/**
 * POST /swaps
 */
export const proposeSwapRequestSchema = z.object({
  requesterShiftId: uuidSchema,
  targetShiftId: uuidSchema,
  message: optionalText(500),
});

/**
 * POST /people
 */
export const createPersonRequestSchema = z.object({
  domain: rotaDomainSchema,
  fullName: nonEmptyString.pipe(z.string().max(100, 'Name must be at most 100 characters')),
  active: z.boolean().optional().default(true),
  queueOrder: z.number().int().min(0).optional(),
  userId: nonEmptyString.nullable().optional(),
  phone: optionalText(30),
  email: z.string().email('Invalid email format').nullable().optional(),
});

/**
 * PATCH /people/{domain}/{personId}
 */
export const updatePersonRequestSchema = z
  .object({
    fullName: nonEmptyString.pipe(z.string().max(100, 'Name must be at most 100 characters')).optional(),
    active: z.boolean().optional(),
    queueOrder: z.number().int().min(0).optional(),
    userId: nonEmptyString.nullable().optional(),
    phone: optionalText(30),
    email: z.string().email('Invalid email format').nullable().optional(),
  })
  .refine((body) => Object.values(body).some((value) => value !== undefined), {
    message: 'At least one field must be provided for update',
  });

/**
 * GET /notifications query string
 */
export const listNotificationsQuerySchema = z.object({
  unreadOnly: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

/**
 * Type exports
 */
export type GenerateScheduleRequest = z.infer<typeof generateScheduleRequestSchema>;
export type CreateShiftRequest = z.infer<typeof createShiftRequestSchema>;
export type UpdateShiftRequest = z.infer<typeof updateShiftRequestSchema>;
export type ReassignShiftRequest = z.infer<typeof reassignShiftRequestSchema>;
export type ListShiftsQuery = z.infer<typeof listShiftsQuerySchema>;
export type ProposeSwapRequest = z.infer<typeof proposeSwapRequestSchema>;
export type CreatePersonRequest = z.infer<typeof createPersonRequestSchema>;
export type UpdatePersonRequest = z.infer<typeof updatePersonRequestSchema>;
