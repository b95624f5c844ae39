export const CLI_NAME = "msgport"
export const DEFAULT_SORT = false
export const DEFAULT_NORMALIZE = false
