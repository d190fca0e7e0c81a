export { formatLinks } from "./formatLinks";
