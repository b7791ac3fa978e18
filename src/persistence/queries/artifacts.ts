/**
 * artifact query functions.
 */

import type { Database as BetterSqlite3Database } from 'better-sqlite3'
import {
  CreateArtifactInputSchema,
  type ArtifactRow,
  type CreateArtifactInput,
} from '../schemas/history.js'
import { nowIso } from '../../utils/helpers.js'

export type { ArtifactRow, CreateArtifactInput }

/** Artifact row joined with the task that wrote it */
export type ArtifactWithTaskRow = ArtifactRow & { task_name: string; process_id: string; is_orchestrator: number }

const SELECT_WITH_TASK = `
  SELECT a.*, t.task_name, t.process_id, t.is_orchestrator FROM artifact a
  JOIN task_log t ON t.task_id = a.task_id
`

export function insertArtifact(db: BetterSqlite3Database, input: CreateArtifactInput): ArtifactWithTaskRow {
  const v = CreateArtifactInputSchema.parse(input)

  db.prepare(`
    INSERT INTO artifact (id, task_id, title, content, format, template_name, tags, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    v.id,
    v.task_id,
    v.title,
    v.content,
    v.format,
    v.template_name ?? null,
    JSON.stringify(v.tags),
    nowIso(),
  )

  const row = getArtifact(db, v.id)
  if (row === undefined) {
    throw new Error(`artifact row ${v.id} missing after insert`)
  }
  return row
}

export function getArtifact(db: BetterSqlite3Database, id: string): ArtifactWithTaskRow | undefined {
  return db.prepare<[string], ArtifactWithTaskRow>(`${SELECT_WITH_TASK} WHERE a.id = ?`).get(id)
}

/** Artifacts written by one task, oldest first. */
export function listArtifactsForTask(db: BetterSqlite3Database, taskId: string): ArtifactWithTaskRow[] {
  return db
    .prepare<[string], ArtifactWithTaskRow>(`${SELECT_WITH_TASK} WHERE a.task_id = ? ORDER BY a.created_at ASC, a.rowid ASC`)
    .all(taskId)
}

/** Artifacts written by any task of a process, oldest first. */
export function listArtifactsForProcess(db: BetterSqlite3Database, processId: string): ArtifactWithTaskRow[] {
  return db
    .prepare<[string], ArtifactWithTaskRow>(
      `${SELECT_WITH_TASK} WHERE t.process_id = ? ORDER BY a.created_at ASC, a.rowid ASC`,
    )
    .all(processId)
}
