import { PersonModel, UpdatePersonInput } from '../models/person';
import { logger } from '../lib/logger';
import { NotFoundError } from '../lib/scheduling/errors';
import { orderRoster, RosterEntry } from '../lib/scheduling/rotation';
import type { Person, RotaDomain } from '../types/entities';
import type { CreatePersonRequest } from '../types/schemas';

/**
 * RosterService
 * Business logic for the two rotation pools
 */
export class RosterService {
  /**
   * Everyone in a pool, queue order first
   */
  static async listPeople(domain: RotaDomain, includeInactive = true): Promise<Person[]> {
    const people = await PersonModel.listByDomain(domain);

    return people
      .filter((person) => includeInactive || person.active)
      .sort((a, b) => a.queueOrder - b.queueOrder || a.fullName.localeCompare(b.fullName));
  }

  /**
   * @throws NotFoundError if the pool has no such person
   */
  static async getPerson(domain: RotaDomain, personId: string): Promise<Person> {
    const person = await PersonModel.getById(domain, personId);
    if (!person) {
      throw new NotFoundError('Person', personId);
    }
    return person;
  }

  /**
   * Active people in rotation order, as the scheduler consumes them
   */
  static async getActiveRoster(domain: RotaDomain): Promise<RosterEntry[]> {
    const people = await PersonModel.listByDomain(domain);

    return orderRoster(
      people.map((person) => ({
        personId: person.personId,
        fullName: person.fullName,
        queueOrder: person.queueOrder,
        active: person.active,
      }))
    );
  }

  /**
   * Add someone to a pool; without a queue position they join at the end
   */
  static async createPerson(input: CreatePersonRequest): Promise<Person> {
    let queueOrder = input.queueOrder;
    if (queueOrder === undefined) {
      const existing = await PersonModel.listByDomain(input.domain);
      queueOrder = existing.length + 1;
    }

    const person = await PersonModel.create({
      domain: input.domain,
      fullName: input.fullName,
      active: input.active,
      queueOrder,
      userId: input.userId ?? null,
      phone: input.phone ?? null,
      email: input.email ?? null,
    });

    logger.info('Person added to roster', { personId: person.personId, domain: person.domain, queueOrder });
    return person;
  }

  /**
   * @throws NotFoundError if the pool has no such person
   */
  static async updatePerson(domain: RotaDomain, personId: string, changes: UpdatePersonInput): Promise<Person> {
    await this.getPerson(domain, personId);
    return PersonModel.update(domain, personId, changes);
  }
}
