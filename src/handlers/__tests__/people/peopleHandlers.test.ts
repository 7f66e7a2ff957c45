/**
 * Tests for roster handlers
 */

// Mock modules (hoisted by Jest)
jest.mock('../../../lib/logger', () => {
  const mockLogger = {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  };

  return {
    logger: mockLogger,
    createLambdaLogger: jest.fn().mockReturnValue(mockLogger),
    logLambdaInvocation: jest.fn(),
    logLambdaCompletion: jest.fn(),
  };
});

jest.mock('../../../services/rosterService');
jest.mock('../../../lib/auth', () => ({
  ...jest.requireActual('../../../lib/auth'),
  getPersonRole: jest.fn(),
}));

import { APIGatewayProxyEvent, Context } from 'aws-lambda';
import { handler as listPeople } from '../../people/listPeople';
import { handler as createPerson } from '../../people/createPerson';
import { handler as updatePerson } from '../../people/updatePerson';
import { RosterService } from '../../../services/rosterService';
import { getPersonRole } from '../../../lib/auth';
import { NotFoundError } from '../../../lib/scheduling/errors';
import { ADMIN, IDS, makePerson, memberRole } from '../../../../tests/helpers/fixtures';

const mockRosterService = RosterService as jest.Mocked<typeof RosterService>;
const mockGetPersonRole = getPersonRole as jest.MockedFunction<typeof getPersonRole>;

describe('people handlers', () => {
  const mockContext = {
    awsRequestId: 'test-request-id',
  } as Context;

  beforeEach(() => {
    mockGetPersonRole.mockResolvedValue(ADMIN);
  });

  describe('listPeople', () => {
    it('lists everyone in the pool by default', async () => {
      mockRosterService.listPeople.mockResolvedValue([makePerson()]);

      const result = await listPeople(
        { pathParameters: { domain: 'collaborator' }, queryStringParameters: null } as unknown as APIGatewayProxyEvent,
        mockContext
      );

      expect(result.statusCode).toBe(200);
      expect(JSON.parse(result.body).data.people).toHaveLength(1);
      expect(mockRosterService.listPeople).toHaveBeenCalledWith('collaborator', true);
    });

    it('can list active people only', async () => {
      mockRosterService.listPeople.mockResolvedValue([]);

      await listPeople(
        {
          pathParameters: { domain: 'technician' },
          queryStringParameters: { active: 'true' },
        } as unknown as APIGatewayProxyEvent,
        mockContext
      );

      expect(mockRosterService.listPeople).toHaveBeenCalledWith('technician', false);
    });

    it('is for admins only', async () => {
      mockGetPersonRole.mockResolvedValue(memberRole(IDS.ana, 'Ana Souza'));

      const result = await listPeople(
        { pathParameters: { domain: 'collaborator' } } as unknown as APIGatewayProxyEvent,
        mockContext
      );

      expect(result.statusCode).toBe(403);
      expect(mockRosterService.listPeople).not.toHaveBeenCalled();
    });
  });

  describe('createPerson', () => {
    it('adds a person to a pool', async () => {
      const person = makePerson({ fullName: 'Davi Rocha' });
      mockRosterService.createPerson.mockResolvedValue(person);

      const result = await createPerson(
        { body: JSON.stringify({ domain: 'collaborator', fullName: '  Davi Rocha ' }) } as unknown as APIGatewayProxyEvent,
        mockContext
      );

      expect(result.statusCode).toBe(201);
      expect(mockRosterService.createPerson).toHaveBeenCalledWith({
        domain: 'collaborator',
        fullName: 'Davi Rocha',
        active: true,
      });
    });

    it('requires a name', async () => {
      const result = await createPerson(
        { body: JSON.stringify({ domain: 'collaborator', fullName: '   ' }) } as unknown as APIGatewayProxyEvent,
        mockContext
      );

      expect(JSON.parse(result.body).error.details).toEqual([{ field: 'fullName', message: 'Cannot be empty' }]);
    });
  });

  describe('updatePerson', () => {
    it('deactivates a person', async () => {
      mockRosterService.updatePerson.mockResolvedValue(makePerson({ active: false }));

      const result = await updatePerson(
        {
          pathParameters: { domain: 'collaborator', personId: IDS.ana },
          body: JSON.stringify({ active: false }),
        } as unknown as APIGatewayProxyEvent,
        mockContext
      );

      expect(result.statusCode).toBe(200);
      expect(mockRosterService.updatePerson).toHaveBeenCalledWith('collaborator', IDS.ana, { active: false });
    });

    it('returns 404 for an unknown person', async () => {
      mockRosterService.updatePerson.mockRejectedValue(new NotFoundError('Person', 'missing'));

      const result = await updatePerson(
        {
          pathParameters: { domain: 'collaborator', personId: 'missing' },
          body: JSON.stringify({ fullName: 'Ana' }),
        } as unknown as APIGatewayProxyEvent,
        mockContext
      );

      expect(result.statusCode).toBe(404);
    });
  });
});
