export {
  RawClassificationSchema,
  type RawClassification,
  type ClassifierPlugin
} from './classifier.js'
export {
  HttpClassifier,
  ClassifierRequestError,
  ClassifierTimeoutError,
  type HttpClassifierConfig
} from './http-classifier.js'
