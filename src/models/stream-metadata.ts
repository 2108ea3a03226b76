/**
 * Stream metadata: the stream types that categorize timeseries, their
 * dimensions, and the streams themselves.
 */

import { RawRecord } from '../types';
import { Entity, RelationMap } from '../core/entity';
import { EntityCollection } from '../core/collection';
import { isRecord } from '../utils/response-handler';

/**
 * One column of a stream type's data.
 */
export class Dimension extends Entity {
  static readonly resource: string = 'dimension';
  static readonly compoundIds: boolean = false;

  get dataType(): string | undefined {
    return this.optionalString('dataType');
  }

  get quantityName(): string | undefined {
    return this.optionalString('quantityName');
  }

  get unitName(): string | undefined {
    return this.optionalString('unitName');
  }
}

export class StreamType extends Entity {
  static readonly resource: string = 'stream_type';
  static readonly compoundIds: boolean = false;
  static readonly relations: RelationMap = Object.freeze({ dimensions: Dimension });

  get name(): string | undefined {
    return this.optionalString('name');
  }

  get dimensions(): Dimension[] {
    const dimensions = this.has('dimensions') ? this.get('dimensions') : [];
    return Array.isArray(dimensions)
      ? dimensions.filter((dimension: unknown): dimension is Dimension => dimension instanceof Dimension)
      : [];
  }
}

export class StreamMetadata extends Entity {
  static readonly resource: string = 'stream';
  static readonly compoundIds: boolean = false;
  static readonly relations: RelationMap = Object.freeze({ streamType: StreamType });

  get algorithm(): string | undefined {
    return this.optionalString('algorithm');
  }

  get patientId(): string | undefined {
    return this.optionalString('patientId');
  }

  /**
   * Unqualified id of the recording device.
   */
  get deviceId(): string | undefined {
    return this.optionalString('deviceId');
  }

  get streamType(): StreamType | undefined {
    const streamType = this.has('streamType') ? this.get('streamType') : undefined;
    return streamType instanceof StreamType ? streamType : undefined;
  }

  get minTime(): number | undefined {
    return this.optionalNumber('minTime');
  }

  get maxTime(): number | undefined {
    return this.optionalNumber('maxTime');
  }

  /**
   * Key/value labels of the stream, such as `category` and `measurement`.
   */
  get parameters(): Record<string, string> {
    const parameters = this.has('parameters') ? this.get('parameters') : undefined;
    const labels: Record<string, string> = {};
    if (isRecord(parameters)) {
      for (const [key, value] of Object.entries(parameters)) {
        if (typeof value === 'string') {
          labels[key] = value;
        }
      }
    }
    return labels;
  }
}

export interface StreamMetadataFilter {
  streamId?: string;
  patientId?: string;
  deviceId?: string;
  streamTypeId?: string;
  algorithm?: string;
  category?: string;
  measurement?: string;
  /**
   * Further stream parameters that must match exactly.
   */
  parameters?: Record<string, string>;
  filterFunction?: (stream: StreamMetadata) => boolean;
}

export class StreamMetadataCollection extends EntityCollection<StreamMetadata> {
  constructor(streams: Iterable<StreamMetadata> = []) {
    super(StreamMetadata, streams);
  }

  /**
   * Streams matching every given criterion, as a new collection. Unset
   * criteria match anything.
   */
  filter(criteria: StreamMetadataFilter): StreamMetadataCollection {
    const parameters: Record<string, string> = { ...criteria.parameters };
    if (criteria.category) {
      parameters['category'] = criteria.category;
    }
    if (criteria.measurement) {
      parameters['measurement'] = criteria.measurement;
    }

    const result = new StreamMetadataCollection();
    for (const stream of this) {
      const labels = stream.parameters;
      if (
        (!criteria.streamId || stream.id === criteria.streamId) &&
        (!criteria.patientId || stream.patientId === criteria.patientId) &&
        (!criteria.deviceId || stream.deviceId === criteria.deviceId) &&
        (!criteria.streamTypeId || stream.streamType?.id === criteria.streamTypeId) &&
        (!criteria.algorithm || stream.algorithm === criteria.algorithm) &&
        Object.entries(parameters).every(([key, value]) => labels[key] === value) &&
        (!criteria.filterFunction || criteria.filterFunction(stream))
      ) {
        result.add(stream);
      }
    }
    return result;
  }

  protected override spawn(): StreamMetadataCollection {
    return new StreamMetadataCollection();
  }
}

/**
 * Flatten a stream type record: `shape.dimensions` moves to `dimensions`,
 * and each dimension's `identifier` becomes its `id`.
 */
export function streamTypeAttributes(record: RawRecord): RawRecord {
  const { shape, ...rest } = record;
  const rawDimensions = isRecord(shape) ? shape['dimensions'] : undefined;
  const dimensions = Array.isArray(rawDimensions)
    ? rawDimensions.filter(isRecord).map(dimension => {
        const { identifier, ...fields } = dimension;
        return { id: identifier, ...fields };
      })
    : [];
  return { ...rest, dimensions };
}
