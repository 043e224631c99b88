export type CsvValue = string | number | null;

export type AuditColumns = {
  created_at: string;
  updated_at: string;
  deleted_at: null;
};

export type HospitalRecord = AuditColumns & {
  hospitalID: string;
  Name: string;
  Address: string;
  PhoneNumber: string;
};

export type DepartmentRecord = AuditColumns & {
  hospitalID: string;
  DeptID: string;
  Name: string;
};

export type ProviderRecord = AuditColumns & {
  hospitalID: string;
  ProviderID: string;
  FirstName: string;
  LastName: string;
  Specialization: string;
  DeptID: string;
  NPI: string;
};

export type PatientRecord = AuditColumns & {
  hospitalID: string;
  PatientID: string;
  FirstName: string;
  LastName: string;
  MiddleName: string;
  SSN: string;
  PhoneNumber: string;
  Gender: 'Male' | 'Female';
  DOB: string;
  Address: string;
  ModifiedDate: string;
};

export type EncounterRecord = AuditColumns & {
  hospitalID: string;
  EncounterID: string;
  PatientID: string;
  EncounterDate: string;
  EncounterType: string;
  ProviderID: string;
  DepartmentID: string;
  ProcedureCode: number;
  InsertedDate: string;
  ModifiedDate: string;
};

export type TransactionRecord = AuditColumns & {
  hospitalID: string;
  TransactionID: string;
  EncounterID: string;
  PatientID: string;
  ProviderID: string;
  DeptID: string;
  VisitDate: string;
  ServiceDate: string;
  PaidDate: string;
  VisitType: string;
  Amount: number;
  AmountType: string;
  PaidAmount: number;
  ClaimID: string;
  PayorID: string;
  ProcedureCode: number;
  ICDCode: string;
  LineOfBusiness: string;
  MedicaidID: string;
  MedicareID: string;
  InsertDate: string;
  ModifiedDate: string;
};

type TableRecords = {
  hospitals: HospitalRecord;
  departments: DepartmentRecord;
  providers: ProviderRecord;
  patients: PatientRecord;
  encounters: EncounterRecord;
  transactions: TransactionRecord;
};

export type TableName = keyof TableRecords;

const AUDIT_COLUMNS = ['created_at', 'updated_at', 'deleted_at'] as const;

// Column order is the order in db/ddl.sql; CSV headers and COPY column lists use it as is.
export const TABLE_COLUMNS: { [T in TableName]: readonly (keyof TableRecords[T])[] } = {
  hospitals: ['hospitalID', 'Name', 'Address', 'PhoneNumber', ...AUDIT_COLUMNS],
  departments: ['hospitalID', 'DeptID', 'Name', ...AUDIT_COLUMNS],
  providers: [
    'hospitalID',
    'ProviderID',
    'FirstName',
    'LastName',
    'Specialization',
    'DeptID',
    'NPI',
    ...AUDIT_COLUMNS,
  ],
  patients: [
    'hospitalID',
    'PatientID',
    'FirstName',
    'LastName',
    'MiddleName',
    'SSN',
    'PhoneNumber',
    'Gender',
    'DOB',
    'Address',
    'ModifiedDate',
    ...AUDIT_COLUMNS,
  ],
  encounters: [
    'hospitalID',
    'EncounterID',
    'PatientID',
    'EncounterDate',
    'EncounterType',
    'ProviderID',
    'DepartmentID',
    'ProcedureCode',
    'InsertedDate',
    'ModifiedDate',
    ...AUDIT_COLUMNS,
  ],
  transactions: [
    'hospitalID',
    'TransactionID',
    'EncounterID',
    'PatientID',
    'ProviderID',
    'DeptID',
    'VisitDate',
    'ServiceDate',
    'PaidDate',
    'VisitType',
    'Amount',
    'AmountType',
    'PaidAmount',
    'ClaimID',
    'PayorID',
    'ProcedureCode',
    'ICDCode',
    'LineOfBusiness',
    'MedicaidID',
    'MedicareID',
    'InsertDate',
    'ModifiedDate',
    ...AUDIT_COLUMNS,
  ],
};

/** Parents before children. */
export const LOAD_ORDER: readonly TableName[] = [
  'hospitals',
  'departments',
  'providers',
  'patients',
  'encounters',
  'transactions',
];

export const DROP_ORDER: readonly TableName[] = [...LOAD_ORDER].reverse();

/** `hospitals.csv` for the single hospital file, `{hospitalid}_{table}.csv` for the rest. */
export function isTableFile(table: TableName, fileName: string): boolean {
  return fileName === `${table}.csv` || fileName.endsWith(`_${table}.csv`);
}

export function columnNames(table: TableName): string[] {
  const columns: readonly PropertyKey[] = TABLE_COLUMNS[table];
  return columns.map(String);
}

export function copyStatement(table: TableName): string {
  return `copy ${table} (${columnNames(table).join(', ')}) from stdin with (format csv, header true)`;
}
