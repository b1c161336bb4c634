import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import { ImportHistoricalDto } from '../../qualification/dto/import-historical.dto';
import { HistoricalStandingInput } from '../../qualification/types/qualification.types';

function flattenErrors(errors: ValidationError[], path = ''): string[] {
  return errors.flatMap((error) => {
    const property = path ? `${path}.${error.property}` : error.property;
    const own = Object.values(error.constraints ?? {}).map((message) => `${property}: ${message}`);
    return [...own, ...flattenErrors(error.children ?? [], property)];
  });
}

/**
 * Parses an archive file: either a bare array of standings or
 * `{ "standings": [...] }`. Validated with the same rules as the import
 * endpoint.
 *
 * @throws Error listing every invalid field
 */
export function parseHistoricalArchive(content: string): HistoricalStandingInput[] {
  const parsed: unknown = JSON.parse(content);
  const body = Array.isArray(parsed) ? { standings: parsed } : parsed;
  if (typeof body !== 'object' || body === null) {
    throw new Error('Invalid historical archive: expected an array or { "standings": [...] }');
  }

  const dto = plainToInstance(ImportHistoricalDto, body);
  const errors = validateSync(dto, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length > 0) {
    throw new Error(`Invalid historical archive: ${flattenErrors(errors).join('; ')}`);
  }

  return dto.standings.map((standing) => ({ ...standing, rank: standing.rank ?? null }));
}
