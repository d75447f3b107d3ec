import { initializeApp, getApps } from "firebase-admin/app";
import { logger } from "firebase-functions/v2";

/**
 * Initializes the Firebase Admin SDK, preventing re-initialization errors.
 */
export const initializeAppIfNeeded = () => {
  if (getApps().length === 0) {
    initializeApp();
    logger.info("Firebase App Initialized");
  }
};
