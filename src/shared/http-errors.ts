import {
  HttpException,
  InternalServerErrorException,
  Logger,
  UnprocessableEntityException,
} from '@nestjs/common';
import { InvalidDateRangeError } from '../analysis/errors';

/** Maps a failure from the detection core onto the JSON error bodies the API answers with. */
export function toHttpError(e: unknown, logger: Logger, context: string): HttpException {
  if (e instanceof HttpException) return e;
  const msg = e instanceof Error ? e.message : 'internal';
  if (e instanceof InvalidDateRangeError)
    return new UnprocessableEntityException({ err: 'invalid_parameters', msg });
  logger.error(`${context} failed: ${msg}`, e instanceof Error ? e.stack : undefined);
  return new InternalServerErrorException({ err: 'internal', msg });
}
