// packages/server/src/triage/index.ts — barrel export

// Orchestrator
export { TriageOrchestrator, replySubject } from './orchestrator.js';
export type { TriageOptions, TriageDependencies } from './orchestrator.js';
export { createTriageOrchestrator, resolveTriageOptions } from './factory.js';

// Errors
export { TriageError, MessageValidationError } from './errors.js';
export type { TriageErrorCode, MessageIssue } from './errors.js';

// Input
export { parseMailMessage } from './message.js';
export { parseInbox, loadInboxFile } from './inbox.js';

// Classification & planning
export { classifyIntent, INTENT_RULES } from './intent-classifier.js';
export { planForIntent, PLAN_TABLE } from './planner.js';

// Context & steps
export { createTriageContext } from './pipeline-context.js';
export type { TriageContext } from './pipeline-context.js';
export { extractDateTime } from './steps/extract-datetime.js';
export type { ExtractDateTimeOptions } from './steps/extract-datetime.js';
export { createEvent, meetingSummary } from './steps/create-event.js';
export { STEP_EXECUTORS, isExecutableStep, assertPlanOrder } from './steps/registry.js';
export type { StepExecutor, StepEnvironment, MutableStepOutputs } from './steps/registry.js';

// Reply synthesis
export {
  generateReply,
  formatMeetingTime,
  senderLocalPart,
  DEFAULT_SIGNATURE,
} from './reply-generator.js';
export type { Signature } from './reply-generator.js';
export { finalizeReply, signatureBlock } from './quality-assurance.js';

// Collaborators
export { MockCalendarService } from './collaborators.js';
export type {
  CalendarService,
  CalendarEventRequest,
  CalendarEventReceipt,
  MailTransport,
  DeliveryAck,
} from './collaborators.js';

// Observer
export { DefaultTriageObserver } from './observer.js';
export type { TriageObserver } from './observer.js';

// Summary
export { summarizeBatch, toActionReport, buildBatchReport } from './summary.js';
export type { ActionReport, BatchReport, BatchReportEntry } from './summary.js';
