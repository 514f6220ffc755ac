// public api for @pagesmith/sdk
// usage:
//   import { stageName, Collaborators, TransientError } from '@pagesmith/sdk';
//   const collaborators: Collaborators = { extract, analyze, write, publish };

export {
    stageName,
    PIPELINE_ORDER,
    isStageName,
    pipelineIndex,
    upstreamOf,
    sortByPipelineOrder,
} from './stages';

export {
    articleStyleSchema,
    audienceSchema,
    sentimentSchema,
    extractedContentSchema,
    analysisSchema,
    articleSchema,
    publishReceiptSchema,
    stageOutputSchemas,
} from './schemas';

export type {
    ArticleStyle,
    Audience,
    Sentiment,
    ExtractedContent,
    Analysis,
    Article,
    PublishReceipt,
    ExtractInput,
    AnalyzeInput,
    WriteInput,
    PublishInput,
    StageInputMap,
    StageOutputMap,
    StageOutputs,
} from './schemas';

export { TransientError, PermanentError } from './collaborators';
export type { CallContext, StageCollaborator, Collaborators } from './collaborators';

export { serialize, snapshot, SerializationError } from './utils/serialization';
