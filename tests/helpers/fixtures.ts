/**
 * Test fixtures for rota entities
 */

import { KeyBuilder, Notification, Person, Shift, SwapRequest } from '../../src/types/entities';
import type { PersonRole } from '../../src/lib/auth';

export const IDS = {
  ana: '11111111-1111-4111-8111-111111111111',
  bruno: '22222222-2222-4222-8222-222222222222',
  carla: '33333333-3333-4333-8333-333333333333',
  shiftX: 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa',
  shiftY: 'bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb',
  swap: 'cccccccc-cccc-4ccc-8ccc-cccccccccccc',
  notification: 'dddddddd-dddd-4ddd-8ddd-dddddddddddd',
} as const;

export const FIXED_CREATED_AT = '2026-06-01T12:00:00.000Z';

export const makePerson = (overrides: Partial<Person> = {}): Person => {
  const personId = overrides.personId ?? IDS.ana;
  const domain = overrides.domain ?? 'collaborator';

  return {
    ...KeyBuilder.person(domain, personId),
    personId,
    domain,
    fullName: 'Ana Souza',
    active: true,
    queueOrder: 1,
    userId: null,
    phone: null,
    email: null,
    entityType: 'Person',
    createdAt: FIXED_CREATED_AT,
    updatedAt: FIXED_CREATED_AT,
    ...overrides,
  };
};

export const makeShift = (overrides: Partial<Shift> = {}): Shift => {
  const shiftId = overrides.shiftId ?? IDS.shiftX;
  const domain = overrides.domain ?? 'collaborator';
  const date = overrides.date ?? '2099-01-03';
  const slotType = overrides.slotType ?? 'SABADO_TARDE1';

  return {
    ...KeyBuilder.shift(domain, date, slotType, shiftId),
    shiftId,
    domain,
    personId: IDS.ana,
    personName: 'Ana Souza',
    partnerId: null,
    partnerName: null,
    date,
    weekday: 'SAB',
    slotType,
    startTime: '13:00',
    endTime: '17:00',
    notes: null,
    version: 1,
    entityType: 'Shift',
    createdAt: FIXED_CREATED_AT,
    updatedAt: FIXED_CREATED_AT,
    ...overrides,
  };
};

export const makeSwap = (overrides: Partial<SwapRequest> = {}): SwapRequest => {
  const swapId = overrides.swapId ?? IDS.swap;
  const requesterId = overrides.requesterId ?? IDS.ana;
  const targetId = overrides.targetId ?? IDS.bruno;

  return {
    ...KeyBuilder.swapRequest(swapId, requesterId, targetId, FIXED_CREATED_AT),
    swapId,
    domain: 'collaborator',
    requesterId,
    requesterName: 'Ana Souza',
    requesterShiftId: IDS.shiftX,
    targetId,
    targetName: 'Bruno Lima',
    targetShiftId: IDS.shiftY,
    status: 'PENDING',
    message: null,
    version: 1,
    resolvedAt: null,
    entityType: 'SwapRequest',
    createdAt: FIXED_CREATED_AT,
    ...overrides,
  };
};

export const makeNotification = (overrides: Partial<Notification> = {}): Notification => {
  const notificationId = overrides.notificationId ?? IDS.notification;
  const recipientId = overrides.recipientId ?? IDS.bruno;

  return {
    ...KeyBuilder.notification(recipientId, notificationId),
    notificationId,
    recipientId,
    kind: 'TROCA_SOLICITADA',
    title: 'Nova solicitação de troca',
    body: 'Ana Souza quer trocar um plantão.',
    relatedSwapId: IDS.swap,
    read: false,
    readAt: null,
    entityType: 'Notification',
    createdAt: FIXED_CREATED_AT,
    ...overrides,
  };
};

export const ADMIN: PersonRole = { kind: 'admin', userId: 'admin-user' };

export const memberRole = (personId: string, personName: string, kind: 'collaborator' | 'technician' = 'collaborator'): PersonRole => ({
  kind,
  userId: `user-${personId}`,
  personId,
  personName,
});
