/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { EventEmitter } from 'node:events';
import type { LineEndingStyle } from '../codec/lineEndings.js';

/**
 * Defines the severity level for user-facing feedback.
 */
export type FeedbackSeverity = 'info' | 'warning' | 'error';

/**
 * Payload for the 'user-feedback' event.
 */
export interface UserFeedbackPayload {
  severity: FeedbackSeverity;
  /**
   * The message to show in the status line.
   */
  message: string;
  /**
   * The original error object, if applicable. Listeners can log its stack
   * while keeping `message` short.
   */
  error?: unknown;
}

/**
 * Payload for the 'document-loaded' event.
 */
export interface DocumentLoadedPayload {
  filePath: string;
  encoding: string;
  lineCount: number;
}

/**
 * Payload for the 'document-saved' event.
 */
export interface DocumentSavedPayload {
  filePath: string;
  encoding: string;
  lineEnding: LineEndingStyle;
  byteLength: number;
}

export enum EditorEvent {
  UserFeedback = 'user-feedback',
  DocumentLoaded = 'document-loaded',
  DocumentSaved = 'document-saved',
  SettingsChanged = 'settings-changed',
}

export interface EditorEvents {
  [EditorEvent.UserFeedback]: [UserFeedbackPayload];
  [EditorEvent.DocumentLoaded]: [DocumentLoadedPayload];
  [EditorEvent.DocumentSaved]: [DocumentSavedPayload];
  [EditorEvent.SettingsChanged]: never[];
}

export class EditorEventEmitter extends EventEmitter<EditorEvents> {
  private _feedbackBacklog: UserFeedbackPayload[] = [];
  private static readonly MAX_BACKLOG_SIZE = 1000;

  /**
   * Sends feedback to the user. Buffers automatically if the UI hasn't
   * subscribed yet.
   */
  emitFeedback(
    severity: FeedbackSeverity,
    message: string,
    error?: unknown,
  ): void {
    const payload: UserFeedbackPayload = { severity, message, error };
    if (this.listenerCount(EditorEvent.UserFeedback) === 0) {
      if (
        this._feedbackBacklog.length >= EditorEventEmitter.MAX_BACKLOG_SIZE
      ) {
        this._feedbackBacklog.shift();
      }
      this._feedbackBacklog.push(payload);
      return;
    }
    this.emit(EditorEvent.UserFeedback, payload);
  }

  emitDocumentLoaded(payload: DocumentLoadedPayload): void {
    this.emit(EditorEvent.DocumentLoaded, payload);
  }

  emitDocumentSaved(payload: DocumentSavedPayload): void {
    this.emit(EditorEvent.DocumentSaved, payload);
  }

  /**
   * Notifies subscribers that the settings file has been rewritten.
   */
  emitSettingsChanged(): void {
    this.emit(EditorEvent.SettingsChanged);
  }

  /**
   * Flushes buffered feedback. Call this right after the primary UI listener
   * subscribes.
   */
  drainBacklogs(): void {
    const backlog = [...this._feedbackBacklog];
    this._feedbackBacklog.length = 0;
    for (const payload of backlog) {
      this.emit(EditorEvent.UserFeedback, payload);
    }
  }
}

export const editorEvents = new EditorEventEmitter();
