import { EvaluationError, errorMessage } from '../../utils/errors';
import { Result, err, ok } from '../../utils/result';
import { isNumber, isPlainObject } from '../../utils/validation';
import { Aggregation, formatAggregation } from '../config/types';
import { TelemetrySource } from './types';

/**
 * Queries an HTTP aggregate endpoint.
 *
 * Request: `POST {url}` with `{ query, aggregation, windowMs }`.
 * Response: `{ value: number }`.
 */
export class HttpTelemetrySource implements TelemetrySource {
  constructor(private readonly url: string) {}

  async queryAggregate(
    conditionQuery: string,
    aggregation: Aggregation,
    windowMs: number,
    signal?: AbortSignal,
  ): Promise<Result<number, EvaluationError>> {
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'Accept': 'application/json',
          'Content-Type': 'application/json',
          'User-Agent': 'Alert-Engine/1.0',
        },
        body: JSON.stringify({ query: conditionQuery, aggregation: formatAggregation(aggregation), windowMs }),
        signal,
      });
    } catch (error) {
      return err(new EvaluationError(`Telemetry request failed: ${errorMessage(error)}`, 'unavailable'));
    }

    if (!response.ok) {
      return err(new EvaluationError(`HTTP ${response.status}: ${response.statusText}`, 'unavailable'));
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch {
      return err(new EvaluationError('Invalid response: body is not JSON', 'malformed'));
    }

    if (!isPlainObject(data) || !isNumber(data.value)) {
      return err(new EvaluationError('Invalid response: expected { value: number }', 'malformed'));
    }

    return ok(data.value);
  }
}
