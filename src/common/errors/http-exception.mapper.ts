import {
  BadGatewayException,
  GatewayTimeoutException,
  HttpException,
  HttpStatus,
  InternalServerErrorException,
  UnprocessableEntityException,
} from '@nestjs/common';
import {
  ConfigurationError,
  DecodeError,
  NetworkError,
  ServiceError,
} from './analysis.errors';

export const GENERIC_ERROR_MESSAGE =
  'Error processing the image. Please try again.';

/**
 * Map any error thrown during analysis to the HttpException returned to the
 * client. Analysis errors keep their message verbatim.
 */
export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) {
    return error;
  }

  if (error instanceof ConfigurationError) {
    return new InternalServerErrorException({
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      error: error.kind,
      message: error.message,
    });
  }

  if (error instanceof NetworkError) {
    if (error.isTimeout) {
      return new GatewayTimeoutException({
        statusCode: HttpStatus.GATEWAY_TIMEOUT,
        error: error.kind,
        message: error.message,
      });
    }
    return new BadGatewayException({
      statusCode: HttpStatus.BAD_GATEWAY,
      error: error.kind,
      message: error.message,
    });
  }

  if (error instanceof ServiceError) {
    return new BadGatewayException({
      statusCode: HttpStatus.BAD_GATEWAY,
      error: error.kind,
      message: error.message,
      upstreamStatus: error.status,
    });
  }

  if (error instanceof DecodeError) {
    return new UnprocessableEntityException({
      statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
      error: error.kind,
      message: error.message,
    });
  }

  return new InternalServerErrorException(GENERIC_ERROR_MESSAGE);
}
