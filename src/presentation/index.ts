export * from "./palette";
export * from "./rows";
export * from "./table";
export * from "./list";
