import { TASK_PREFIX_PLACEHOLDER } from '../config/constants';

/**
 * A string with slots where the task identifier goes. The slots are fixed at
 * parse time, so an identifier that itself contains the token is inserted
 * verbatim and never expanded again.
 */
export class PlaceholderTemplate {
  private constructor(private readonly literals: readonly string[]) {}

  static parse(source: string, token: string = TASK_PREFIX_PLACEHOLDER): PlaceholderTemplate {
    return new PlaceholderTemplate(source.split(token));
  }

  get slotCount(): number {
    return this.literals.length - 1;
  }

  render(identifier: string): string {
    return this.literals.join(identifier);
  }
}

export function substitutePlaceholder(value: string, identifier: string): string;
export function substitutePlaceholder(value: string | undefined, identifier: string): string | undefined;
export function substitutePlaceholder(value: string | undefined, identifier: string): string | undefined {
  if (value === undefined) return undefined;
  return PlaceholderTemplate.parse(value).render(identifier);
}
