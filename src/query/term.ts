import { ParsingError, QueryConstructionError, WireFormatError } from '../errors.js';
import type { StreamInput, StreamOutput } from '../io/stream.js';
import { isValue, type Token, type TokenStream } from '../xcontent/token.js';
import { AbstractQueryNode, BOOST_FIELD, NAME_FIELD, readBoost } from './abstract-query.js';
import type { ExecutableQuery, TermValue } from './executable.js';
import { combineHashes, hashString, hashValue } from './hash.js';
import type { QueryParseContext } from './parse-context.js';
import { ParseField } from './parse-field.js';
import { DEFAULT_BOOST, type QueryNode, type XContentObject } from './types.js';

const VALUE_FIELD = new ParseField('value');
const TERM_FIELD = new ParseField('term');

function readTermValue(stream: TokenStream, token: Token): TermValue {
  switch (token) {
    case 'VALUE_NUMBER': {
      const value = stream.doubleValue();
      if (!Number.isFinite(value)) {
        throw new ParsingError(stream.tokenLocation(), `[${TermQueryNode.NAME}] value [${stream.text()}] is out of range`);
      }
      if (/^-?\d+$/.test(stream.text()) && !Number.isSafeInteger(value)) {
        throw new ParsingError(
          stream.tokenLocation(),
          `[${TermQueryNode.NAME}] integer value [${stream.text()}] cannot be represented exactly`,
        );
      }
      return value;
    }
    case 'VALUE_BOOLEAN':
      return stream.booleanValue();
    default:
      return stream.text();
  }
}

/**
 * Exact match of a field value in the document source. Dotted field names
 * address nested objects.
 */
export class TermQueryNode extends AbstractQueryNode {
  static readonly NAME = 'term';

  readonly writeableName = TermQueryNode.NAME;

  constructor(
    readonly fieldName: string,
    readonly value: TermValue,
  ) {
    super();
    if (fieldName == null || fieldName === '') {
      throw new QueryConstructionError('field name is null or empty');
    }
    if (value == null) {
      throw new QueryConstructionError('value cannot be null');
    }
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new QueryConstructionError(`value must be a finite number, got [${value}]`);
    }
  }

  protected doXContent(): XContentObject {
    return {
      [this.fieldName]: this.printBoostAndQueryName({ value: this.value }),
    };
  }

  static fromXContent(context: QueryParseContext): TermQueryNode {
    const stream = context.stream;
    let queryName: string | null = null;
    let fieldName: string | null = null;
    let value: TermValue | null = null;
    let boost = DEFAULT_BOOST;

    let currentFieldName: string | null = null;
    let token: Token | null;
    while ((token = stream.nextToken()) !== 'END_OBJECT') {
      if (token === null) {
        throw new ParsingError(stream.tokenLocation(), `[${TermQueryNode.NAME}] unexpected end of input`);
      }
      if (token === 'FIELD_NAME') {
        currentFieldName = stream.currentName();
      } else if (context.isDeprecatedSetting(currentFieldName)) {
        stream.skipChildren();
      } else if (token === 'START_OBJECT') {
        if (fieldName !== null) {
          throw new ParsingError(
            stream.tokenLocation(),
            `[${TermQueryNode.NAME}] query does not support different field names, use [bool] query instead`,
          );
        }
        fieldName = currentFieldName;
        while ((token = stream.nextToken()) !== 'END_OBJECT') {
          if (token === null) {
            throw new ParsingError(stream.tokenLocation(), `[${TermQueryNode.NAME}] unexpected end of input`);
          }
          if (token === 'FIELD_NAME') {
            currentFieldName = stream.currentName();
          } else if (isValue(token)) {
            if (context.match(currentFieldName, TERM_FIELD) || context.match(currentFieldName, VALUE_FIELD)) {
              value = readTermValue(stream, token);
            } else if (context.match(currentFieldName, NAME_FIELD)) {
              queryName = stream.text();
            } else if (context.match(currentFieldName, BOOST_FIELD)) {
              boost = readBoost(stream);
            } else {
              throw new ParsingError(
                stream.tokenLocation(),
                `[${TermQueryNode.NAME}] query does not support [${String(currentFieldName)}]`,
              );
            }
          } else {
            throw new ParsingError(stream.tokenLocation(), `unexpected token [${token}]`);
          }
        }
      } else if (isValue(token)) {
        if (context.match(currentFieldName, NAME_FIELD)) {
          queryName = stream.text();
        } else if (context.match(currentFieldName, BOOST_FIELD)) {
          boost = readBoost(stream);
        } else {
          if (fieldName !== null) {
            throw new ParsingError(
              stream.tokenLocation(),
              `[${TermQueryNode.NAME}] query does not support different field names, use [bool] query instead`,
            );
          }
          fieldName = currentFieldName;
          value = readTermValue(stream, token);
        }
      } else {
        throw new ParsingError(stream.tokenLocation(), `unexpected token [${token}]`);
      }
    }

    if (fieldName === null || fieldName === '' || value === null) {
      throw new ParsingError(stream.tokenLocation(), `[${TermQueryNode.NAME}] requires a field and a value`);
    }
    return new TermQueryNode(fieldName, value).setBoost(boost).setQueryName(queryName);
  }

  static readFrom(input: StreamInput): TermQueryNode {
    const fieldName = input.readString();
    const value = input.readGenericValue();
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new WireFormatError(`invalid [${TermQueryNode.NAME}] value [${value}] for field [${fieldName}]`);
    }
    return new TermQueryNode(fieldName, value);
  }

  protected doWriteTo(out: StreamOutput): void {
    out.writeString(this.fieldName);
    out.writeGenericValue(this.value);
  }

  protected doToQuery(): ExecutableQuery | null {
    return { kind: 'term', field: this.fieldName, value: this.value };
  }

  protected doHashCode(): number {
    return combineHashes(hashString(this.fieldName), hashValue(this.value));
  }

  protected doEquals(other: QueryNode): boolean {
    return other instanceof TermQueryNode && this.fieldName === other.fieldName && this.value === other.value;
  }
}
