/**
 * Person request schema tests
 */

import { createPersonRequestSchema, updatePersonRequestSchema } from '../../../src/types/schemas';

describe('person request schemas', () => {
  it('accepts queue position 0 at the head of the queue', () => {
    const result = createPersonRequestSchema.safeParse({ domain: 'collaborator', fullName: 'Zeca', queueOrder: 0 });

    expect(result.success).toBe(true);
    expect(result.success && result.data.queueOrder).toBe(0);
  });

  it('rejects a negative queue position', () => {
    const result = createPersonRequestSchema.safeParse({ domain: 'collaborator', fullName: 'Zeca', queueOrder: -1 });

    expect(result.success).toBe(false);
    expect(result.success || result.error.issues[0]?.path).toEqual(['queueOrder']);
  });

  it('lets an update move someone to position 0', () => {
    expect(updatePersonRequestSchema.safeParse({ queueOrder: 0 }).success).toBe(true);
  });
});
