export { EmailAgent, emailGuidance, emailRows, fallbackDecision, isEmailRow } from './EmailAgent';
