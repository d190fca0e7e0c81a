export { HttpTabSource } from "./httpTabSource";
export type { TabSource } from "@/interfaces/tabSource/tabSource";
