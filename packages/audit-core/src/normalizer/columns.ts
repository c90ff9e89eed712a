/**
 * Column names of the two exports
 */

export interface BillingColumns {
  identifier: string;
  salesPartner: string;
  state: string;
  displayName: string;
  /** Optional column */
  plan: string;
}

export interface CrmColumns {
  identifier: string;
  workflowStatus: string;
  projectName: string;
}

export interface ColumnMapping {
  billing: BillingColumns;
  crm: CrmColumns;
}

export interface ColumnOverrides {
  billing?: Partial<BillingColumns>;
  crm?: Partial<CrmColumns>;
}

export const DEFAULT_COLUMNS: ColumnMapping = {
  billing: {
    identifier: 'location id',
    salesPartner: 'salespartner name',
    state: 'location state',
    displayName: 'name',
    plan: 'plan',
  },
  crm: {
    identifier: 'uberall-Location-ID',
    workflowStatus: 'Workflow-Status',
    projectName: 'Projektname',
  },
};

export function resolveColumns(overrides?: ColumnOverrides): ColumnMapping {
  return {
    billing: { ...DEFAULT_COLUMNS.billing, ...overrides?.billing },
    crm: { ...DEFAULT_COLUMNS.crm, ...overrides?.crm },
  };
}

/** Columns the billing export must contain */
export function requiredBillingColumns(columns: BillingColumns): string[] {
  return [columns.identifier, columns.salesPartner, columns.state, columns.displayName];
}

/** Columns the CRM export must contain */
export function requiredCrmColumns(columns: CrmColumns): string[] {
  return [columns.identifier, columns.projectName, columns.workflowStatus];
}
