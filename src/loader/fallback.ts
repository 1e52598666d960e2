/**
 * Built-in fallback tables
 *
 * A small deterministic table set with the same typed schema as the remote
 * tables, used whenever the remote dataset is unavailable. It spans five
 * domains, rates T001 and T002 by two workers each, and lists every task in
 * all three tables.
 *
 * @module loader/fallback
 */

import type { ExpertRating, RawTables, TaskMetadata, WorkerResponse } from '../types/tables'

const FALLBACK_WORKER: readonly WorkerResponse[] = [
  {
    taskId: 'T001',
    task: 'Create marketing materials and promotional content',
    occupation: 'Marketing Managers',
    domain: 'Marketing',
    automationDesireRating: 4.2,
    jobSecurityRating: 3.1,
    enjoymentRating: 3.8,
    workerId: 'W001',
  },
  {
    taskId: 'T002',
    task: 'Analyze customer feedback and survey responses',
    occupation: 'Market Research Analysts',
    domain: 'Research',
    automationDesireRating: 4.7,
    jobSecurityRating: 2.8,
    enjoymentRating: 2.9,
    workerId: 'W002',
  },
  {
    taskId: 'T003',
    task: 'Schedule appointments and manage calendars',
    occupation: 'Administrative Assistants',
    domain: 'Administration',
    automationDesireRating: 4.9,
    jobSecurityRating: 2.3,
    enjoymentRating: 2.1,
    workerId: 'W003',
  },
  {
    taskId: 'T004',
    task: 'Provide emotional support and counseling to patients',
    occupation: 'Clinical Social Workers',
    domain: 'Healthcare',
    automationDesireRating: 1.2,
    jobSecurityRating: 4.8,
    enjoymentRating: 4.9,
    workerId: 'W004',
  },
  {
    taskId: 'T005',
    task: 'Write and edit technical documentation',
    occupation: 'Technical Writers',
    domain: 'Technical',
    automationDesireRating: 3.4,
    jobSecurityRating: 3.6,
    enjoymentRating: 4.1,
    workerId: 'W005',
  },
  {
    taskId: 'T001',
    task: 'Create marketing materials and promotional content',
    occupation: 'Marketing Managers',
    domain: 'Marketing',
    automationDesireRating: 3.8,
    jobSecurityRating: 3.5,
    enjoymentRating: 4.0,
    workerId: 'W006',
  },
  {
    taskId: 'T002',
    task: 'Analyze customer feedback and survey responses',
    occupation: 'Market Research Analysts',
    domain: 'Research',
    automationDesireRating: 4.5,
    jobSecurityRating: 3.0,
    enjoymentRating: 3.2,
    workerId: 'W007',
  },
]

const FALLBACK_EXPERT: readonly ExpertRating[] = [
  {
    taskId: 'T001',
    task: 'Create marketing materials and promotional content',
    expertCapabilityRating: 3.5,
    confidence: 4.2,
    expertId: 'E001',
  },
  {
    taskId: 'T002',
    task: 'Analyze customer feedback and survey responses',
    expertCapabilityRating: 4.1,
    confidence: 4.5,
    expertId: 'E002',
  },
  {
    taskId: 'T003',
    task: 'Schedule appointments and manage calendars',
    expertCapabilityRating: 4.8,
    confidence: 4.9,
    expertId: 'E003',
  },
  {
    taskId: 'T004',
    task: 'Provide emotional support and counseling to patients',
    expertCapabilityRating: 1.5,
    confidence: 4.7,
    expertId: 'E004',
  },
  {
    taskId: 'T005',
    task: 'Write and edit technical documentation',
    expertCapabilityRating: 3.8,
    confidence: 4.0,
    expertId: 'E005',
  },
]

const FALLBACK_TASK: readonly TaskMetadata[] = [
  {
    taskId: 'T001',
    task: 'Create marketing materials and promotional content',
    occupation: 'Marketing Managers',
    onetSocCode: '11-2021.00',
    domain: 'Marketing',
    taskCategory: 'Creative',
  },
  {
    taskId: 'T002',
    task: 'Analyze customer feedback and survey responses',
    occupation: 'Market Research Analysts',
    onetSocCode: '13-1161.00',
    domain: 'Research',
    taskCategory: 'Analytical',
  },
  {
    taskId: 'T003',
    task: 'Schedule appointments and manage calendars',
    occupation: 'Administrative Assistants',
    onetSocCode: '43-6011.00',
    domain: 'Administration',
    taskCategory: 'Organizational',
  },
  {
    taskId: 'T004',
    task: 'Provide emotional support and counseling to patients',
    occupation: 'Clinical Social Workers',
    onetSocCode: '21-1022.00',
    domain: 'Healthcare',
    taskCategory: 'Interpersonal',
  },
  {
    taskId: 'T005',
    task: 'Write and edit technical documentation',
    occupation: 'Technical Writers',
    onetSocCode: '27-3042.00',
    domain: 'Technical',
    taskCategory: 'Communication',
  },
]

/**
 * Freeze a table and each of its rows
 */
export function freezeTable<T extends object>(rows: readonly T[]): readonly Readonly<T>[] {
  return Object.freeze(rows.map(row => Object.freeze({ ...row })))
}

/**
 * Freeze a raw table set, table by table and row by row
 */
export function freezeTables(tables: RawTables): RawTables {
  return Object.freeze({
    worker: freezeTable(tables.worker),
    expert: freezeTable(tables.expert),
    task: freezeTable(tables.task),
  })
}

/**
 * The fallback table set. The same frozen instance is returned on every call.
 */
export const FALLBACK_TABLES: RawTables = freezeTables({
  worker: FALLBACK_WORKER,
  expert: FALLBACK_EXPERT,
  task: FALLBACK_TASK,
})

export function fallbackTables(): RawTables {
  return FALLBACK_TABLES
}
