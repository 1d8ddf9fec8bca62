export { FeedbackChannel, classifyStressLevel, stressMetricsSchema } from './FeedbackChannel.js';
