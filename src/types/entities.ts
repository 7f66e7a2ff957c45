/**
 * Entity Type Definitions - Duty Rota Service
 *
 * All entities follow DynamoDB single-table design pattern.
 * Shared across backend Lambda functions for type safety.
 */

/**
 * Base entity with common attributes
 */
export interface BaseEntity {
  PK: string;
  SK: string;
  entityType: EntityType;
  createdAt: string; // ISO 8601
}

/**
 * Entity type discriminator
 */
export type EntityType =
  | 'Person'
  | 'Shift'
  | 'GenerationRun'
  | 'SwapRequest'
  | 'SwapGuard'
  | 'Notification';

/**
 * Scheduling domain - each staff pool rotates on its own calendar
 */
export type RotaDomain = 'collaborator' | 'technician';

export const ROTA_DOMAINS: readonly RotaDomain[] = ['collaborator', 'technician'];

/**
 * Collaborator slots (five per weekend)
 */
export type CollaboratorSlotType =
  | 'SABADO_TARDE1'
  | 'SABADO_TARDE2'
  | 'DOMINGO_MANHA'
  | 'DOMINGO_TARDE1'
  | 'DOMINGO_TARDE2';

/**
 * Technician slots (paired Saturday, solo Sunday)
 */
export type TechnicianSlotType = 'SABADO_DUPLA' | 'DOMINGO_AVULSO';

export type SlotType = CollaboratorSlotType | TechnicianSlotType;

/**
 * Weekday label stored on every shift
 */
export type ShiftWeekday = 'SAB' | 'DOM';

/**
 * Swap request lifecycle status; everything except PENDING is terminal
 */
export type SwapStatus = 'PENDING' | 'ACCEPTED' | 'REJECTED' | 'CANCELLED';

/**
 * Notification kinds emitted by swap transitions
 */
export type NotificationKind =
  | 'TROCA_SOLICITADA'
  | 'TROCA_ACEITA'
  | 'TROCA_RECUSADA'
  | 'TROCA_CANCELADA';

/**
 * Person Entity - collaborator or field technician in a rotation pool
 */
export interface Person extends BaseEntity {
  personId: string; // UUID
  domain: RotaDomain;
  fullName: string;
  active: boolean;
  queueOrder: number;
  userId: string | null; // Cognito sub of the linked login, if any
  phone: string | null;
  email: string | null;
  entityType: 'Person';
  updatedAt: string;
  GSI1PK?: string; // USER#{userId}
  GSI1SK?: string; // PERSON#{domain}
}

/**
 * Shift Entity - one person (plus optional partner) in one slot on one date
 */
export interface Shift extends BaseEntity {
  shiftId: string; // UUID
  domain: RotaDomain;
  personId: string;
  personName: string;
  partnerId: string | null; // paired technician slots only
  partnerName: string | null;
  date: string; // YYYY-MM-DD
  weekday: ShiftWeekday;
  slotType: SlotType;
  startTime: string; // HH:mm
  endTime: string; // HH:mm
  notes: string | null;
  version: number;
  entityType: 'Shift';
  updatedAt: string;
  GSI1PK: string; // SHIFT#{shiftId}
  GSI1SK: string; // SHIFT
}

/**
 * GenerationRun Entity - audit record of one automatic schedule generation
 */
export interface GenerationRun extends BaseEntity {
  runId: string;
  domain: RotaDomain;
  startDate: string;
  cycleCount: number;
  shiftsCreated: number;
  createdBy: string;
  entityType: 'GenerationRun';
}

/**
 * SwapRequest Entity - proposal to exchange the owners of two shifts
 */
export interface SwapRequest extends BaseEntity {
  swapId: string;
  domain: RotaDomain;
  requesterId: string;
  requesterName: string;
  requesterShiftId: string;
  targetId: string;
  targetName: string;
  targetShiftId: string;
  status: SwapStatus;
  message: string | null;
  version: number;
  resolvedAt: string | null;
  entityType: 'SwapRequest';
  GSI1PK: string; // PERSON#{requesterId}#SWAPS
  GSI1SK: string; // CREATED#{createdAt}
  GSI2PK: string; // PERSON#{targetId}#SWAPS
  GSI2SK: string; // CREATED#{createdAt}
}

/**
 * Notification Entity - in-app message produced by a swap transition
 */
export interface Notification extends BaseEntity {
  notificationId: string;
  recipientId: string;
  kind: NotificationKind;
  title: string;
  body: string;
  relatedSwapId: string;
  read: boolean;
  readAt: string | null;
  entityType: 'Notification';
}

/**
 * Key builders for single-table design
 */
export const KeyBuilder = {
  person: (domain: RotaDomain, personId: string) => ({
    PK: `DOMAIN#${domain}`,
    SK: `PERSON#${personId}`,
  }),

  personUserIndex: (userId: string, domain: RotaDomain) => ({
    GSI1PK: `USER#${userId}`,
    GSI1SK: `PERSON#${domain}`,
  }),

  shift: (domain: RotaDomain, date: string, slotType: SlotType, shiftId: string) => ({
    PK: `DOMAIN#${domain}#SHIFTS`,
    SK: `SLOT#${date}#${slotType}`,
    GSI1PK: `SHIFT#${shiftId}`,
    GSI1SK: 'SHIFT',
  }),

  generationRun: (domain: RotaDomain, runId: string, createdAt: string) => ({
    PK: `DOMAIN#${domain}#RUNS`,
    SK: `RUN#${createdAt}#${runId}`,
  }),

  swapRequest: (swapId: string, requesterId: string, targetId: string, createdAt: string) => ({
    PK: `SWAP#${swapId}`,
    SK: 'METADATA',
    GSI1PK: `PERSON#${requesterId}#SWAPS`,
    GSI1SK: `CREATED#${createdAt}`,
    GSI2PK: `PERSON#${targetId}#SWAPS`,
    GSI2SK: `CREATED#${createdAt}`,
  }),

  // At most one PENDING request per (requester, shift pair)
  swapGuard: (requesterShiftId: string, targetShiftId: string, requesterId: string) => ({
    PK: `SWAPGUARD#${requesterShiftId}#${targetShiftId}`,
    SK: `REQUESTER#${requesterId}`,
  }),

  notification: (recipientId: string, notificationId: string) => ({
    PK: `PERSON#${recipientId}`,
    SK: `NOTIFICATION#${notificationId}`,
  }),
};
