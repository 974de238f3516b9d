import { BadRequestException, ConflictException, ForbiddenException, NotFoundException } from '@nestjs/common';

export type ErrorCode = 'PERMISSION_DENIED' | 'NOT_FOUND' | 'CONFLICT' | 'VALIDATION_ERROR';

export interface ErrorBody {
  statusCode: number;
  code: ErrorCode;
  message: string;
}

export class PermissionDeniedException extends ForbiddenException {
  readonly code: ErrorCode = 'PERMISSION_DENIED';

  constructor(message = 'Permission denied') {
    super({ statusCode: 403, code: 'PERMISSION_DENIED', message } satisfies ErrorBody);
  }
}

export class RecordNotFoundException extends NotFoundException {
  readonly code: ErrorCode = 'NOT_FOUND';

  constructor(message = 'Not found') {
    super({ statusCode: 404, code: 'NOT_FOUND', message } satisfies ErrorBody);
  }
}

export class StateConflictException extends ConflictException {
  readonly code: ErrorCode = 'CONFLICT';

  constructor(message = 'Conflict') {
    super({ statusCode: 409, code: 'CONFLICT', message } satisfies ErrorBody);
  }
}

export class ValidationException extends BadRequestException {
  readonly code: ErrorCode = 'VALIDATION_ERROR';

  constructor(message = 'Invalid input') {
    super({ statusCode: 400, code: 'VALIDATION_ERROR', message } satisfies ErrorBody);
  }
}
