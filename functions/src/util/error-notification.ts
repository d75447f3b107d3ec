import { logger } from "firebase-functions/v2";
import { errorWebhookUrl } from "../constants";

export const notifyError = async (
  errorMessage: string,
  context?: Record<string, unknown>,
): Promise<void> => {
  const webhookUrl = errorWebhookUrl.value();
  if (!webhookUrl) {
    logger.warn("ERROR_WEBHOOK_URL is not set, skipping error notification", { errorMessage });
    return;
  }

  try {
    const response = await fetch(webhookUrl, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        error: errorMessage,
        context: context || {},
        timestamp: new Date().toISOString(),
      }),
    });

    if (response.ok) {
      logger.info("Error notification sent successfully", { errorMessage });
    } else {
      logger.error("Failed to send error notification", {
        httpStatus: response.status,
        errorMessage,
      });
    }
  } catch (notificationError) {
    logger.error("Error sending notification", {
      notificationError:
        notificationError instanceof Error ? notificationError.message : "Unknown error",
      originalError: errorMessage,
    });
  }
};
