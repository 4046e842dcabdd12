import * as admin from "firebase-admin";
import { Logger } from "../utils/logger";

let firestore: admin.firestore.Firestore | null = null;
let firebaseError: Error | null = null;

/**
 * Инициализация Firebase Admin SDK по требованию (только для STORAGE_DRIVER=firestore).
 * Поддерживает два способа: service account JSON целиком или отдельные переменные окружения.
 */
export function getFirestore(): admin.firestore.Firestore | null {
  if (firestore) {
    return firestore;
  }

  if (!admin.apps.length) {
    try {
      const serviceAccountJson = process.env.FIREBASE_SERVICE_ACCOUNT;

      if (serviceAccountJson) {
        admin.initializeApp({
          credential: admin.credential.cert(JSON.parse(serviceAccountJson))
        });
        Logger.info("[Firebase] Admin initialized from FIREBASE_SERVICE_ACCOUNT env variable");
      } else {
        const projectId = process.env.FIREBASE_PROJECT_ID;
        const clientEmail = process.env.FIREBASE_CLIENT_EMAIL;
        const privateKey = process.env.FIREBASE_PRIVATE_KEY?.replace(/\\n/g, "\n");

        if (!projectId || !clientEmail || !privateKey) {
          Logger.warn("[Firebase] Admin not initialized: missing env variables", {
            hasServiceAccount: !!process.env.FIREBASE_SERVICE_ACCOUNT,
            hasProjectId: !!projectId,
            hasClientEmail: !!clientEmail,
            hasPrivateKey: !!privateKey
          });
          firebaseError = new Error(
            "Set FIREBASE_SERVICE_ACCOUNT or FIREBASE_PROJECT_ID, FIREBASE_CLIENT_EMAIL, FIREBASE_PRIVATE_KEY"
          );
          return null;
        }

        admin.initializeApp({
          credential: admin.credential.cert({ projectId, clientEmail, privateKey })
        });
        Logger.info("[Firebase] Admin initialized from individual env variables");
      }
    } catch (error) {
      firebaseError = error instanceof Error ? error : new Error(String(error));
      Logger.error("[Firebase] Failed to initialize Admin SDK", firebaseError);
      return null;
    }
  }

  firestore = admin.firestore();
  return firestore;
}

export function getFirebaseError(): Error | null {
  return firebaseError;
}
