import path from 'node:path';
import { Faker, base, en } from '@faker-js/faker';
import { createLogger } from '../logger.js';
import {
  TABLE_COLUMNS,
  type AuditColumns,
  type DepartmentRecord,
  type EncounterRecord,
  type HospitalRecord,
  type PatientRecord,
  type ProviderRecord,
  type TableName,
  type TransactionRecord,
} from '../schema.js';
import { writeCsv } from './csv.js';

const logger = createLogger('generator');

const HOSPITAL_NAME_FRAGMENTS = [
  'General',
  'Memorial',
  'Regional',
  'Community',
  'University',
  'Medical Center',
  "St. Mary's",
  'Sacred Heart',
  'City',
  'County',
];

export const DEPARTMENT_NAMES = [
  'Emergency',
  'Cardiology',
  'Neurology',
  'Oncology',
  'Pediatrics',
  'Orthopedics',
  'Dermatology',
  'Gastroenterology',
  'Urology',
  'Radiology',
  'Anesthesiology',
  'Pathology',
  'Surgery',
  'Pulmonology',
  'Nephrology',
  'Ophthalmology',
  'Gynecology',
  'Psychiatry',
  'Endocrinology',
  'Rheumatology',
];

export const SPECIALIZATIONS = [
  'Cardiology',
  'Neurology',
  'Orthopedics',
  'General Surgery',
  'Pediatrics',
  'Radiology',
  'Dermatology',
  'Oncology',
  'Anesthesiology',
  'Emergency Medicine',
  'Psychiatry',
];

export const ENCOUNTER_TYPES = ['Inpatient', 'Outpatient', 'Emergency', 'Telemedicine', 'Routine Checkup'];
export const AMOUNT_TYPES = ['Co-pay', 'Insurance', 'Self-pay', 'Medicaid', 'Medicare'];
export const VISIT_TYPES = ['Routine', 'Follow-up', 'Emergency', 'Consultation'];
export const LINES_OF_BUSINESS = ['Commercial', 'Medicaid', 'Medicare', 'Self-Pay'];

const GENDERS = ['Male', 'Female'] as const;

// Foreign keys are drawn from these fixed ranges, not from what was generated.
export const PROVIDER_ID_RANGE = 50;
export const DEPARTMENT_ID_RANGE = DEPARTMENT_NAMES.length;
export const ENCOUNTER_ID_RANGE = 10000;

const PROCEDURE_CODE_POOL_SIZE = 1000;
const ICD_CODE_POOL_SIZE = 100;

export type GenerateOptions = {
  outputDir: string;
  /** Seeds this call's random source. Unseeded calls differ run to run. */
  seed?: number;
  /** Reference time for audit timestamps and date ranges. */
  now?: Date;
};

export type GenerationPlan = {
  hospitals: number;
  hospitalId: string;
  providers: number;
  patients: number;
  encounters: number;
  transactions: number;
};

export const DEFAULT_PLAN: GenerationPlan = {
  hospitals: 1,
  hospitalId: 'HOSP1',
  providers: 50,
  patients: 5000,
  encounters: 10000,
  transactions: 10000,
};

export type GenerationSummary = {
  files: string[];
  rows: Record<TableName, number>;
};

type GenerationContext = {
  faker: Faker;
  now: Date;
  audit: AuditColumns;
  outputDir: string;
};

function createContext({ outputDir, seed, now = new Date() }: GenerateOptions): GenerationContext {
  const faker = new Faker({ locale: [en, base] });
  if (seed !== undefined) {
    faker.seed(seed);
  }
  const timestamp = now.toISOString();
  return {
    faker,
    now,
    audit: { created_at: timestamp, updated_at: timestamp, deleted_at: null },
    outputDir,
  };
}

function assertCount(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new RangeError(`${label} must be a non-negative integer, got ${value}`);
  }
}

function sequence(count: number): number[] {
  return Array.from({ length: count }, (_, index) => index + 1);
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

export function toIsoDate(value: Date): string {
  return value.toISOString().split('T')[0];
}

export function hospitalFileName(hospitalId: string, table: Exclude<TableName, 'hospitals'>): string {
  return `${hospitalId.toLowerCase()}_${table}.csv`;
}

export function departmentId(index: number): string {
  return `DEPT${pad(index, 3)}`;
}

export function providerId(index: number): string {
  return `PROV${pad(index, 4)}`;
}

export function patientId(hospitalId: string, index: number): string {
  return `${hospitalId}-${pad(index, 6)}`;
}

export function encounterId(index: number): string {
  return `ENC${pad(index, 6)}`;
}

export function transactionId(index: number): string {
  return `TRANS${pad(index, 6)}`;
}

function address(faker: Faker): string {
  const state = faker.location.state({ abbreviated: true });
  return `${faker.location.streetAddress()}, ${faker.location.city()}, ${state} ${faker.location.zipCode('#####')}`;
}

function dateThisDecade({ faker, now }: GenerationContext): string {
  const from = new Date(Date.UTC(now.getUTCFullYear() - (now.getUTCFullYear() % 10), 0, 1));
  return toIsoDate(faker.date.between({ from, to: now }));
}

function dateThisYear({ faker, now }: GenerationContext): string {
  const from = new Date(Date.UTC(now.getUTCFullYear(), 0, 1));
  return toIsoDate(faker.date.between({ from, to: now }));
}

function procedureCodePool(faker: Faker): number[] {
  return Array.from({ length: PROCEDURE_CODE_POOL_SIZE }, () => faker.number.int({ min: 10000, max: 99999 }));
}

function icdCodePool(faker: Faker): string[] {
  return Array.from(
    { length: ICD_CODE_POOL_SIZE },
    () => `I${faker.number.int({ min: 10, max: 99 })}.${faker.number.int({ min: 0, max: 9 })}`
  );
}

function uniqueNpis(faker: Faker, count: number): string[] {
  const seen = new Set<string>();
  while (seen.size < count) {
    seen.add(faker.string.numeric({ length: 10, allowLeadingZeros: false }));
  }
  return [...seen];
}

export async function generateHospitals(count: number, options: GenerateOptions): Promise<HospitalRecord[]> {
  assertCount('hospital count', count);
  logger.info(`Generating ${count} hospital records...`);
  const context = createContext(options);
  const { faker } = context;

  const records = sequence(count).map<HospitalRecord>((index) => ({
    hospitalID: `HOSP${index}`,
    Name: `${faker.helpers.arrayElement(HOSPITAL_NAME_FRAGMENTS)} Hospital ${index}`,
    Address: address(faker),
    PhoneNumber: faker.phone.number(),
    ...context.audit,
  }));

  await writeCsv(path.join(context.outputDir, 'hospitals.csv'), TABLE_COLUMNS.hospitals, records);
  logger.info('Saved hospitals.csv');
  return records;
}

export async function generateDepartments(hospitalId: string, options: GenerateOptions): Promise<DepartmentRecord[]> {
  logger.info(`Generating departments for ${hospitalId}...`);
  const context = createContext(options);

  const records = DEPARTMENT_NAMES.map<DepartmentRecord>((name, index) => ({
    hospitalID: hospitalId,
    DeptID: departmentId(index + 1),
    Name: name,
    ...context.audit,
  }));

  const fileName = hospitalFileName(hospitalId, 'departments');
  await writeCsv(path.join(context.outputDir, fileName), TABLE_COLUMNS.departments, records);
  logger.info(`Saved ${fileName}`);
  return records;
}

export async function generateProviders(
  count: number,
  hospitalId: string,
  options: GenerateOptions
): Promise<ProviderRecord[]> {
  assertCount('provider count', count);
  logger.info(`Generating ${count} provider records for ${hospitalId}...`);
  const context = createContext(options);
  const { faker } = context;
  const departments = sequence(DEPARTMENT_ID_RANGE).map(departmentId);
  const npis = uniqueNpis(faker, count);

  const records = sequence(count).map<ProviderRecord>((index) => ({
    hospitalID: hospitalId,
    ProviderID: providerId(index),
    FirstName: faker.person.firstName(),
    LastName: faker.person.lastName(),
    Specialization: faker.helpers.arrayElement(SPECIALIZATIONS),
    DeptID: faker.helpers.arrayElement(departments),
    NPI: npis[index - 1],
    ...context.audit,
  }));

  const fileName = hospitalFileName(hospitalId, 'providers');
  await writeCsv(path.join(context.outputDir, fileName), TABLE_COLUMNS.providers, records);
  logger.info(`Saved ${fileName}`);
  return records;
}

export async function generatePatients(
  count: number,
  hospitalId: string,
  options: GenerateOptions
): Promise<PatientRecord[]> {
  assertCount('patient count', count);
  logger.info(`Generating ${count} patient records for ${hospitalId}...`);
  const context = createContext(options);
  const { faker, now } = context;

  const records = sequence(count).map<PatientRecord>((index) => ({
    hospitalID: hospitalId,
    PatientID: patientId(hospitalId, index),
    FirstName: faker.person.firstName(),
    LastName: faker.person.lastName(),
    MiddleName: faker.string.alpha({ length: 1, casing: 'upper' }),
    SSN: faker.helpers.replaceSymbols('###-##-####'),
    PhoneNumber: faker.phone.number(),
    Gender: faker.helpers.arrayElement(GENDERS),
    DOB: toIsoDate(faker.date.birthdate({ min: 0, max: 100, mode: 'age', refDate: now })),
    Address: address(faker),
    ModifiedDate: dateThisDecade(context),
    ...context.audit,
  }));

  const fileName = hospitalFileName(hospitalId, 'patients');
  await writeCsv(path.join(context.outputDir, fileName), TABLE_COLUMNS.patients, records);
  logger.info(`Saved ${fileName}`);
  return records;
}

export async function generateEncounters(
  count: number,
  hospitalId: string,
  patientCount: number,
  options: GenerateOptions
): Promise<EncounterRecord[]> {
  assertCount('encounter count', count);
  assertCount('patient count', patientCount);
  logger.info(`Generating ${count} encounter records for ${hospitalId}...`);
  const context = createContext(options);
  const { faker } = context;
  const procedureCodes = procedureCodePool(faker);

  const records = sequence(count).map<EncounterRecord>((index) => ({
    hospitalID: hospitalId,
    EncounterID: encounterId(index),
    PatientID: patientId(hospitalId, faker.number.int({ min: 1, max: patientCount })),
    EncounterDate: dateThisDecade(context),
    EncounterType: faker.helpers.arrayElement(ENCOUNTER_TYPES),
    ProviderID: providerId(faker.number.int({ min: 1, max: PROVIDER_ID_RANGE })),
    DepartmentID: departmentId(faker.number.int({ min: 1, max: DEPARTMENT_ID_RANGE })),
    ProcedureCode: faker.helpers.arrayElement(procedureCodes),
    InsertedDate: dateThisDecade(context),
    ModifiedDate: dateThisDecade(context),
    ...context.audit,
  }));

  const fileName = hospitalFileName(hospitalId, 'encounters');
  await writeCsv(path.join(context.outputDir, fileName), TABLE_COLUMNS.encounters, records);
  logger.info(`Saved ${fileName}`);
  return records;
}

export async function generateTransactions(
  count: number,
  hospitalId: string,
  patientCount: number,
  options: GenerateOptions
): Promise<TransactionRecord[]> {
  assertCount('transaction count', count);
  assertCount('patient count', patientCount);
  logger.info(`Generating ${count} transaction records for ${hospitalId}...`);
  const context = createContext(options);
  const { faker } = context;
  const procedureCodes = procedureCodePool(faker);
  const icdCodes = icdCodePool(faker);

  // Amount and PaidAmount are independent draws; PaidAmount may exceed Amount.
  const records = sequence(count).map<TransactionRecord>((index) => ({
    hospitalID: hospitalId,
    TransactionID: transactionId(index),
    EncounterID: encounterId(faker.number.int({ min: 1, max: ENCOUNTER_ID_RANGE })),
    PatientID: patientId(hospitalId, faker.number.int({ min: 1, max: patientCount })),
    ProviderID: providerId(faker.number.int({ min: 1, max: PROVIDER_ID_RANGE })),
    DeptID: departmentId(faker.number.int({ min: 1, max: DEPARTMENT_ID_RANGE })),
    VisitDate: dateThisYear(context),
    ServiceDate: dateThisYear(context),
    PaidDate: dateThisYear(context),
    VisitType: faker.helpers.arrayElement(VISIT_TYPES),
    Amount: faker.number.int({ min: 5000, max: 100000 }) / 100,
    AmountType: faker.helpers.arrayElement(AMOUNT_TYPES),
    PaidAmount: faker.number.int({ min: 2000, max: 80000 }) / 100,
    ClaimID: `CLAIM${faker.number.int({ min: 100000, max: 999999 })}`,
    PayorID: `PAYOR${faker.number.int({ min: 1000, max: 9999 })}`,
    ProcedureCode: faker.helpers.arrayElement(procedureCodes),
    ICDCode: faker.helpers.arrayElement(icdCodes),
    LineOfBusiness: faker.helpers.arrayElement(LINES_OF_BUSINESS),
    MedicaidID: `MEDI${faker.number.int({ min: 10000, max: 99999 })}`,
    MedicareID: `MCARE${faker.number.int({ min: 10000, max: 99999 })}`,
    InsertDate: dateThisDecade(context),
    ModifiedDate: dateThisDecade(context),
    ...context.audit,
  }));

  const fileName = hospitalFileName(hospitalId, 'transactions');
  await writeCsv(path.join(context.outputDir, fileName), TABLE_COLUMNS.transactions, records);
  logger.info(`Saved ${fileName}`);
  return records;
}

/** Offsets the seed per step so each file draws from its own stream. */
export function stepOptions(options: GenerateOptions, step: number): GenerateOptions {
  return options.seed === undefined ? options : { ...options, seed: options.seed + step };
}

/**
 * Writes the full CSV set for one hospital id into `options.outputDir`.
 */

export async function generateAll(plan: GenerationPlan, options: GenerateOptions): Promise<GenerationSummary> {
  const { hospitalId } = plan;
  const hospitals = await generateHospitals(plan.hospitals, stepOptions(options, 0));
  const departments = await generateDepartments(hospitalId, stepOptions(options, 1));
  const providers = await generateProviders(plan.providers, hospitalId, stepOptions(options, 2));
  const patients = await generatePatients(plan.patients, hospitalId, stepOptions(options, 3));
  const encounters = await generateEncounters(plan.encounters, hospitalId, plan.patients, stepOptions(options, 4));
  const transactions = await generateTransactions(
    plan.transactions,
    hospitalId,
    plan.patients,
    stepOptions(options, 5)
  );

  return {
    files: [
      'hospitals.csv',
      hospitalFileName(hospitalId, 'departments'),
      hospitalFileName(hospitalId, 'providers'),
      hospitalFileName(hospitalId, 'patients'),
      hospitalFileName(hospitalId, 'encounters'),
      hospitalFileName(hospitalId, 'transactions'),
    ],
    rows: {
      hospitals: hospitals.length,
      departments: departments.length,
      providers: providers.length,
      patients: patients.length,
      encounters: encounters.length,
      transactions: transactions.length,
    },
  };
}
