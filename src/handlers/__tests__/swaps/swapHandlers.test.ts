/**
 * Tests for swap request handlers
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

jest.mock('../../../services/swapService');
jest.mock('../../../lib/auth', () => ({
  ...jest.requireActual('../../../lib/auth'),
  getPersonRole: jest.fn(),
}));

import { APIGatewayProxyEvent, Context } from 'aws-lambda';
import { handler as proposeSwap } from '../../swaps/proposeSwap';
import { handler as acceptSwap } from '../../swaps/acceptSwap';
import { handler as rejectSwap } from '../../swaps/rejectSwap';
import { handler as cancelSwap } from '../../swaps/cancelSwap';
import { handler as listSwaps } from '../../swaps/listSwaps';
import { SwapService } from '../../../services/swapService';
import { getPersonRole } from '../../../lib/auth';
import { NotAuthorizedError, NotPendingError, SelfSwapError, StaleSwapError } from '../../../lib/scheduling/errors';
import { IDS, makeSwap, memberRole } from '../../../../tests/helpers/fixtures';

const mockSwapService = SwapService as jest.Mocked<typeof SwapService>;
const mockGetPersonRole = getPersonRole as jest.MockedFunction<typeof getPersonRole>;

describe('swap handlers', () => {
  const mockContext = {
    awsRequestId: 'test-request-id',
  } as Context;

  const ana = memberRole(IDS.ana, 'Ana Souza');
  const bruno = memberRole(IDS.bruno, 'Bruno Lima');

  beforeEach(() => {
    mockGetPersonRole.mockResolvedValue(ana);
  });

  describe('proposeSwap', () => {
    it('creates a swap request', async () => {
      const swap = makeSwap();
      mockSwapService.propose.mockResolvedValue(swap);

      const event = {
        body: JSON.stringify({ requesterShiftId: IDS.shiftX, targetShiftId: IDS.shiftY, message: 'Viagem' }),
      } as unknown as APIGatewayProxyEvent;

      const result = await proposeSwap(event, mockContext);

      expect(result.statusCode).toBe(201);
      expect(JSON.parse(result.body)).toEqual({ data: swap, message: 'Swap request sent' });
      expect(mockSwapService.propose).toHaveBeenCalledWith(ana, {
        requesterShiftId: IDS.shiftX,
        targetShiftId: IDS.shiftY,
        message: 'Viagem',
      });
    });

    it('rejects a body without the target shift', async () => {
      const event = { body: JSON.stringify({ requesterShiftId: IDS.shiftX }) } as unknown as APIGatewayProxyEvent;

      const result = await proposeSwap(event, mockContext);

      expect(result.statusCode).toBe(400);
      expect(JSON.parse(result.body).error.details).toEqual([{ field: 'targetShiftId', message: 'Required' }]);
      expect(mockSwapService.propose).not.toHaveBeenCalled();
    });

    it('returns the rule violation raised by the service', async () => {
      mockSwapService.propose.mockRejectedValue(new SelfSwapError());

      const event = {
        body: JSON.stringify({ requesterShiftId: IDS.shiftX, targetShiftId: IDS.shiftY }),
      } as unknown as APIGatewayProxyEvent;

      const result = await proposeSwap(event, mockContext);

      expect(result.statusCode).toBe(422);
      expect(JSON.parse(result.body).error.code).toBe('SELF_SWAP');
    });
  });

  describe('acceptSwap', () => {
    it('accepts as the target', async () => {
      mockGetPersonRole.mockResolvedValue(bruno);
      const accepted = makeSwap({ status: 'ACCEPTED', version: 2 });
      mockSwapService.accept.mockResolvedValue(accepted);

      const event = { pathParameters: { swapId: IDS.swap } } as unknown as APIGatewayProxyEvent;
      const result = await acceptSwap(event, mockContext);

      expect(result.statusCode).toBe(200);
      expect(JSON.parse(result.body).data.status).toBe('ACCEPTED');
      expect(mockSwapService.accept).toHaveBeenCalledWith(bruno, IDS.swap);
    });

    it('reports a stale swap as a conflict', async () => {
      mockSwapService.accept.mockRejectedValue(new StaleSwapError(IDS.swap));

      const event = { pathParameters: { swapId: IDS.swap } } as unknown as APIGatewayProxyEvent;
      const result = await acceptSwap(event, mockContext);

      expect(result.statusCode).toBe(409);
      expect(JSON.parse(result.body).error).toEqual({
        code: 'STALE_SWAP',
        message: `Shifts of swap request ${IDS.swap} changed owner since it was proposed`,
        details: { swapId: IDS.swap },
      });
    });

    it('needs the swap id', async () => {
      const result = await acceptSwap({ pathParameters: null } as unknown as APIGatewayProxyEvent, mockContext);

      expect(result.statusCode).toBe(400);
      expect(JSON.parse(result.body).error.message).toBe('Missing required path parameter: swapId');
    });
  });

  describe('rejectSwap', () => {
    it('rejects a pending swap', async () => {
      mockSwapService.reject.mockResolvedValue(makeSwap({ status: 'REJECTED', version: 2 }));

      const event = { pathParameters: { swapId: IDS.swap } } as unknown as APIGatewayProxyEvent;
      const result = await rejectSwap(event, mockContext);

      expect(result.statusCode).toBe(200);
      expect(JSON.parse(result.body).data.status).toBe('REJECTED');
    });

    it('reports a swap that is no longer pending', async () => {
      mockSwapService.reject.mockRejectedValue(new NotPendingError(IDS.swap, 'CANCELLED'));

      const event = { pathParameters: { swapId: IDS.swap } } as unknown as APIGatewayProxyEvent;
      const result = await rejectSwap(event, mockContext);

      expect(result.statusCode).toBe(409);
      expect(JSON.parse(result.body).error.details).toEqual({ swapId: IDS.swap, status: 'CANCELLED' });
    });
  });

  describe('cancelSwap', () => {
    it('cancels as the requester', async () => {
      mockSwapService.cancel.mockResolvedValue(makeSwap({ status: 'CANCELLED', version: 2 }));

      const event = { pathParameters: { swapId: IDS.swap } } as unknown as APIGatewayProxyEvent;
      const result = await cancelSwap(event, mockContext);

      expect(result.statusCode).toBe(200);
      expect(mockSwapService.cancel).toHaveBeenCalledWith(ana, IDS.swap);
    });
  });

  describe('listSwaps', () => {
    it('lists the swaps of the caller', async () => {
      mockSwapService.listForPerson.mockResolvedValue([makeSwap()]);

      const event = { queryStringParameters: null } as unknown as APIGatewayProxyEvent;
      const result = await listSwaps(event, mockContext);

      expect(result.statusCode).toBe(200);
      expect(JSON.parse(result.body).data.swaps).toHaveLength(1);
      expect(mockSwapService.listForPerson).toHaveBeenCalledWith(ana, undefined);
    });

    it('fails when the caller is not linked to the rota', async () => {
      mockGetPersonRole.mockRejectedValue(new NotAuthorizedError('User is not linked to a rota member'));

      const result = await listSwaps({ queryStringParameters: null } as unknown as APIGatewayProxyEvent, mockContext);

      expect(result.statusCode).toBe(403);
      expect(mockSwapService.listForPerson).not.toHaveBeenCalled();
    });
  });
});
