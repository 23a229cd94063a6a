export { cn } from './cn';
export { isTextInputFocused } from './focus';
