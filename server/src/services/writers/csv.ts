import { defineWriter } from "../renderer";

// The default slots already produce the commented CSV line format.
export const csvWriter = defineWriter("csv");
