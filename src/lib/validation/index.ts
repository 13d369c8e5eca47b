export { validateInput } from "./validateInput";
export type { InputSummary } from "./validateInput";
