/**
 * Note records: conversion, metadata and ordering
 *
 * @since 2026-10-19
 */

export {
  NoteEngine,
  createNoteEngine,
  DEFAULT_CATEGORY,
  DEFAULT_UNDATED_LABEL,
  DEFAULT_TITLE_LABELS,
} from './NoteEngine.js';
export type { CreateNoteEngineOptions } from './NoteEngine.js';
export {
  createNoteMetadata,
  parseSortKey,
  compareSortKeys,
  compareNotes,
  OLDEST,
} from './NoteMetadata.js';
export type {
  SourceDocument,
  SortKey,
  NoteMetadata,
  NoteMetadataInput,
  NoteRecord,
  NoteEngineOptions,
} from './types.js';
