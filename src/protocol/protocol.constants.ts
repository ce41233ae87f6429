export const RESOURCE_SEPARATOR = "\r"; // Reserved, never allowed inside a resource field
export const BOOLEAN_TRUE = "true";
export const BOOLEAN_FALSE = "false";
