export type { IEmotionClassifier, ClassifierCallOptions, ClassifyImageRequest, ClassifyDescriptionRequest } from './IEmotionClassifier';
export type { IVoiceTranscriber, VoiceTranscription } from './IVoiceTranscriber';
export type { IImagePreparer, ImagePreparationOptions, PreparedImage } from './IImagePreparer';
export { noopFeedback, type ICheckInFeedback } from './ICheckInFeedback';
