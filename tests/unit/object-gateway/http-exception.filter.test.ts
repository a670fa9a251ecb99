import test from 'node:test';
import assert from 'node:assert/strict';
import { BadRequestException, HttpStatus, NotFoundException } from '@nestjs/common';
import {
  normalizeHttpException,
  statusForObjectStoreError,
} from '../../../services/object-gateway/src/presentation/http/common/http-exception.filter';
import {
  ObjectChangedError,
  RangeNotSatisfiableError,
} from '../../../services/object-gateway/src/domain/objects/object-store.errors';

test('statusForObjectStoreError maps every store error code', () => {
  assert.equal(statusForObjectStoreError('OBJECT_NOT_FOUND'), 404);
  assert.equal(statusForObjectStoreError('RANGE_NOT_SATISFIABLE'), 416);
  assert.equal(statusForObjectStoreError('MALFORMED_OBJECT_RESPONSE'), 502);
  assert.equal(statusForObjectStoreError('OBJECT_CHANGED'), 409);
  assert.equal(statusForObjectStoreError('INVALID_SEEK'), 400);
  assert.equal(statusForObjectStoreError('INVALID_OBJECT_KEY'), 400);
  assert.equal(statusForObjectStoreError('UNSUPPORTED_OPERATION'), 501);
});

test('normalizeHttpException exposes store error codes and messages', () => {
  assert.deepEqual(normalizeHttpException(new ObjectChangedError('a.txt', 'size was 10, now 12')), {
    statusCode: HttpStatus.CONFLICT,
    code: 'OBJECT_CHANGED',
    message: 'Object "a.txt" changed during read: size was 10, now 12',
  });
  assert.deepEqual(normalizeHttpException(new RangeNotSatisfiableError('a.txt', { start: 4, end: 9 })), {
    statusCode: HttpStatus.REQUESTED_RANGE_NOT_SATISFIABLE,
    code: 'RANGE_NOT_SATISFIABLE',
    message: 'Range bytes=4-9 is not satisfiable for object "a.txt".',
  });
});

test('normalizeHttpException keeps Nest HTTP exception messages', () => {
  assert.deepEqual(normalizeHttpException(new BadRequestException('key is required.')), {
    statusCode: 400,
    code: 'BAD_REQUEST',
    message: 'key is required.',
    details: undefined,
  });
  assert.deepEqual(normalizeHttpException(new NotFoundException()), {
    statusCode: 404,
    code: 'NOT_FOUND',
    message: 'Not Found',
    details: undefined,
  });
});

test('normalizeHttpException hides unexpected errors', () => {
  assert.deepEqual(normalizeHttpException(new Error('socket hang up')), {
    statusCode: 500,
    code: 'INTERNAL_SERVER_ERROR',
    message: 'Unexpected server error.',
  });
});
