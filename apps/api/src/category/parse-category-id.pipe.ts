import { ArgumentMetadata, Injectable, ParseIntPipe, PipeTransform } from '@nestjs/common';

import { CategoryNotFoundException } from '../common/exceptions';

/**
 * Upper bound of the `serial` primary key (PostgreSQL `int4`).
 */
export const MAX_CATEGORY_ID = 2147483647;

/**
 * Parses the `:id` route parameter. Non-numeric input is a 400; integers no
 * category can have are a 404 naming the id as requested, without a query.
 */
@Injectable()
export class ParseCategoryIdPipe implements PipeTransform<string, Promise<number>> {
  private readonly parseInt = new ParseIntPipe();

  async transform(value: string, metadata: ArgumentMetadata): Promise<number> {
    const id = await this.parseInt.transform(value, metadata);
    if (id < 1 || id > MAX_CATEGORY_ID) throw new CategoryNotFoundException(value);
    return id;
  }
}
