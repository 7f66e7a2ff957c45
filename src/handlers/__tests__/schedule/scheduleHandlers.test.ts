/**
 * Tests for schedule generation handlers
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

jest.mock('../../../services/scheduleService');
jest.mock('../../../lib/auth', () => ({
  ...jest.requireActual('../../../lib/auth'),
  getPersonRole: jest.fn(),
}));

import { APIGatewayProxyEvent, Context } from 'aws-lambda';
import { handler as generateSchedule } from '../../schedule/generateSchedule';
import { handler as listGenerationRuns } from '../../schedule/listGenerationRuns';
import { ScheduleService } from '../../../services/scheduleService';
import { getPersonRole } from '../../../lib/auth';
import { InsufficientRosterError, NotAuthorizedError } from '../../../lib/scheduling/errors';
import type { GenerationRun } from '../../../types/entities';
import { ADMIN, IDS, makeShift, memberRole } from '../../../../tests/helpers/fixtures';

const mockScheduleService = ScheduleService as jest.Mocked<typeof ScheduleService>;
const mockGetPersonRole = getPersonRole as jest.MockedFunction<typeof getPersonRole>;

const run: GenerationRun = {
  PK: 'DOMAIN#collaborator#RUNS',
  SK: 'RUN#2099-01-01T00:00:00.000Z#run-1',
  runId: 'run-1',
  domain: 'collaborator',
  startDate: '2099-01-03',
  cycleCount: 1,
  shiftsCreated: 1,
  createdBy: 'admin-user',
  entityType: 'GenerationRun',
  createdAt: '2099-01-01T00:00:00.000Z',
};

describe('schedule handlers', () => {
  const mockContext = {
    awsRequestId: 'test-request-id',
  } as Context;

  beforeEach(() => {
    mockGetPersonRole.mockResolvedValue(ADMIN);
  });

  describe('generateSchedule', () => {
    it('returns 201 with the created shifts', async () => {
      mockScheduleService.generateSchedule.mockResolvedValue({
        dryRun: false,
        startDate: '2099-01-03',
        cycleCount: 1,
        run,
        shifts: [makeShift()],
      });

      const event = {
        body: JSON.stringify({ domain: 'collaborator', startDate: '2099-01-03', cycleCount: 1 }),
      } as unknown as APIGatewayProxyEvent;

      const result = await generateSchedule(event, mockContext);

      expect(result.statusCode).toBe(201);
      expect(JSON.parse(result.body).message).toBe('Schedule generated successfully');
      expect(mockScheduleService.generateSchedule).toHaveBeenCalledWith(ADMIN, {
        domain: 'collaborator',
        startDate: '2099-01-03',
        cycleCount: 1,
        dryRun: false,
      });
    });

    it('returns 200 for a preview', async () => {
      mockScheduleService.generateSchedule.mockResolvedValue({
        dryRun: true,
        startDate: '2099-01-03',
        cycleCount: 4,
        assignments: [],
      });

      const event = { body: JSON.stringify({ domain: 'technician', dryRun: true }) } as unknown as APIGatewayProxyEvent;

      const result = await generateSchedule(event, mockContext);

      expect(result.statusCode).toBe(200);
      expect(JSON.parse(result.body)).toEqual({
        data: { dryRun: true, startDate: '2099-01-03', cycleCount: 4, assignments: [] },
        message: 'Schedule preview',
      });
    });

    it('rejects a fractional cycle count', async () => {
      const event = { body: JSON.stringify({ domain: 'collaborator', cycleCount: 1.5 }) } as unknown as APIGatewayProxyEvent;

      const result = await generateSchedule(event, mockContext);

      expect(JSON.parse(result.body).error.details).toEqual([
        { field: 'cycleCount', message: 'Cycle count must be a whole number' },
      ]);
    });

    it('reports a roster that is too small', async () => {
      mockScheduleService.generateSchedule.mockRejectedValue(new InsufficientRosterError(1, 2));

      const event = { body: JSON.stringify({ domain: 'collaborator' }) } as unknown as APIGatewayProxyEvent;
      const result = await generateSchedule(event, mockContext);

      expect(result.statusCode).toBe(422);
      expect(JSON.parse(result.body).error.message).toBe('At least 2 active people are required, found 1');
    });

    it('refuses members', async () => {
      mockGetPersonRole.mockResolvedValue(memberRole(IDS.ana, 'Ana Souza'));
      mockScheduleService.generateSchedule.mockRejectedValue(
        new NotAuthorizedError('Admin role required for this operation')
      );

      const event = { body: JSON.stringify({ domain: 'collaborator' }) } as unknown as APIGatewayProxyEvent;
      const result = await generateSchedule(event, mockContext);

      expect(result.statusCode).toBe(403);
    });
  });

  describe('listGenerationRuns', () => {
    it('defaults to the collaborator pool', async () => {
      mockScheduleService.listRuns.mockResolvedValue([run]);

      const result = await listGenerationRuns(
        { queryStringParameters: null } as unknown as APIGatewayProxyEvent,
        mockContext
      );

      expect(result.statusCode).toBe(200);
      expect(JSON.parse(result.body).data.runs).toEqual([run]);
      expect(mockScheduleService.listRuns).toHaveBeenCalledWith(ADMIN, 'collaborator');
    });

    it('validates the domain', async () => {
      const result = await listGenerationRuns(
        { queryStringParameters: { domain: 'nurse' } } as unknown as APIGatewayProxyEvent,
        mockContext
      );

      expect(result.statusCode).toBe(400);
      expect(mockScheduleService.listRuns).not.toHaveBeenCalled();
    });
  });
});
