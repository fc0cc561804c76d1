export { completionsRoutes } from './completions.routes';
export type { CompletionsRoutesOptions } from './completions.routes';
export { CompletionsService } from './completions.service';
export { CompletionLog } from './completion-log';
export { MongoCompletionsRepository } from './completions.repository';
export type { CompletionsRepository } from './completions.repository';
