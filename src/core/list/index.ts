export { type ElementFlags, scanElement, convertElement, needsQuoting, quoteElement } from "./element";
