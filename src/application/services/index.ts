export { SubmissionNotifierService } from './submission-notifier.service';
export { SubmissionAuditorService } from './submission-auditor.service';
