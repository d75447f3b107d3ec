import { defineString } from "firebase-functions/params";

export const API_KEY_SECRET_LITERAL = "API_KEY";
export const PRODUCTS_COLLECTION = "products";
export const FLYERS_COLLECTION = "flyers";
export const FLYERS_STORAGE_PREFIX = "flyers/";
export const FUNCTION_REGION = "europe-west1";

export const errorWebhookUrl = defineString("ERROR_WEBHOOK_URL", { default: "" });
export const flyerBucketName = defineString("FLYER_BUCKET", {
  default: `${process.env.GCLOUD_PROJECT ?? "demo-flyer-deals"}.firebasestorage.app`,
});
