const SYSTEM_ICONS = '/System/Library/CoreServices/CoreTypes.bundle/Contents/Resources'

export const ICON_ERROR = `${SYSTEM_ICONS}/AlertStopIcon.icns`
export const ICON_INFO = `${SYSTEM_ICONS}/ToolbarInfo.icns`
export const ICON_NOTE = `${SYSTEM_ICONS}/AlertNoteIcon.icns`
export const ICON_SETTINGS = `${SYSTEM_ICONS}/ToolbarAdvanced.icns`
export const ICON_WARNING = `${SYSTEM_ICONS}/AlertCautionIcon.icns`

/** Shipped with the workflow, relative to its directory */
export const ICON_WORKFLOW = 'icon.png'
