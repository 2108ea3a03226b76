/**
 * Projects, cohorts and the patients enrolled in them, with the data
 * availability metrics computed for each enrolled patient.
 */

import { Entity, RelationMap } from '../core/entity';

/**
 * One measurement over a patient's processed data, e.g. TOTAL_HOURS of
 * APPLEWATCH_TREMOR over FOURTEEN_DAYS.
 */
export class Metric extends Entity {
  static readonly resource: string = 'metric';
  static readonly compoundIds: boolean = false;

  get type(): string | undefined {
    return this.optionalString('type');
  }

  get dataType(): string | undefined {
    return this.optionalString('dataType');
  }

  get timeInterval(): string | undefined {
    return this.optionalString('timeInterval');
  }

  get value(): number | undefined {
    return this.optionalNumber('value');
  }
}

export class Cohort extends Entity {
  static readonly resource: string = 'cohort';
  static readonly compoundIds: boolean = false;

  get title(): string | undefined {
    return this.optionalString('title');
  }
}

export class Project extends Entity {
  static readonly resource: string = 'project';
  static readonly compoundIds: boolean = false;
  static readonly relations: RelationMap = Object.freeze({ cohorts: Cohort });

  get title(): string | undefined {
    return this.optionalString('title');
  }

  get status(): string | undefined {
    return this.optionalString('status');
  }

  get type(): string | undefined {
    return this.optionalString('type');
  }

  get cohorts(): Cohort[] {
    const cohorts = this.has('cohorts') ? this.get('cohorts') : [];
    return Array.isArray(cohorts)
      ? cohorts.filter((cohort: unknown): cohort is Cohort => cohort instanceof Cohort)
      : [];
  }
}

function metricsOf(entity: Entity): Metric[] {
  const metrics = entity.has('metrics') ? entity.get('metrics') : [];
  return Array.isArray(metrics)
    ? metrics.filter((metric: unknown): metric is Metric => metric instanceof Metric)
    : [];
}

/**
 * A patient enrolled in a project. The id is the patient's id as the
 * enrollment record reports it.
 */
export class ProjectPatient extends Entity {
  static readonly resource: string = 'project_patient';
  static readonly compoundIds: boolean = false;
  static readonly relations: RelationMap = Object.freeze({ metrics: Metric });

  get codeName(): string | undefined {
    return this.optionalString('codeName');
  }

  get metrics(): Metric[] {
    return metricsOf(this);
  }
}

export class CohortPatient extends Entity {
  static readonly resource: string = 'cohort_patient';
  static readonly compoundIds: boolean = false;
  static readonly relations: RelationMap = Object.freeze({ metrics: Metric });

  get codeName(): string | undefined {
    return this.optionalString('codeName');
  }

  get metrics(): Metric[] {
    return metricsOf(this);
  }
}
