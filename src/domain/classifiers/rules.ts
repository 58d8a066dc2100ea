import tables from './keywords.json';
import { KeywordClassifier } from './KeywordClassifier';

/** Actions whose effect may be hard to undo. */
export const destructiveActions = new KeywordClassifier('destructive', tables.destructive);

/** Bot checks that only a human can pass. */
export const captchaPages = new KeywordClassifier('captcha', tables.captcha);

/** Buttons and links that open a login form. */
export const loginControls = new KeywordClassifier('loginControl', tables.loginControl);

/** URLs and titles of login or authorization pages. */
export const authLocations = new KeywordClassifier('authLocation', tables.authLocation);

/** URL fragments of pages that show one item rather than a list. */
export const singleItemUrls = new KeywordClassifier('singleItemUrl', tables.singleItemUrl);

/** Affirmative answers to a confirmation prompt. */
export const confirmations = new KeywordClassifier('confirmation', tables.confirmation);

/** Tasks about reading or sorting a mailbox. */
export const emailTasks = new KeywordClassifier('emailTask', tables.emailTask);

/** Text and attributes that mark a message row; categories carry separate weights. */
export const emailMarkers = new KeywordClassifier('emailMarker', tables.emailMarker);

/** URLs and titles of webmail pages. */
export const mailLocations = new KeywordClassifier('mailLocation', tables.mailLocation);

/** Message content that looks like bulk or promotional mail. */
export const spamContents = new KeywordClassifier('spamContent', tables.spamContent);

/** Delete and back-to-list controls of a webmail client. */
export const mailControls = new KeywordClassifier('mailControl', tables.mailControl);
