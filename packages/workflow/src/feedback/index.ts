export {
  Feedback,
  icon,
  fileIcon,
  type FeedbackDocument,
  type FeedbackIcon,
  type FeedbackItem,
} from './feedback.js'
export {
  ICON_ERROR,
  ICON_INFO,
  ICON_NOTE,
  ICON_SETTINGS,
  ICON_WARNING,
  ICON_WORKFLOW,
} from './icons.js'
