export * from "./grid";
export * from "./frontier";
export * from "./breach";
export * from "./solver";
export * from "./maze";
