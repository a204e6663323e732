export const USER_AGENT = "castgrab/0.1 (+https://www.npmjs.com/package/castgrab)";
