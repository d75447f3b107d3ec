import {
  exportRecordsCsv,
  exportShoppingGuide,
  findBestDeals,
  generateShoppingList,
  importRecordsCsv,
  optimizeCart,
  promoSummary,
} from "./deal-analysis";
import { crawlRetailerFlyers } from "./flyer-crawler";
import { processFlyerOnUpload, retryProcessFlyer } from "./flyer-import/process-flyer";

exports.crawlRetailerFlyers = crawlRetailerFlyers;
exports.processFlyerOnUpload = processFlyerOnUpload;
exports.retryProcessFlyer = retryProcessFlyer;
exports.findBestDeals = findBestDeals;
exports.optimizeCart = optimizeCart;
exports.generateShoppingList = generateShoppingList;
exports.promoSummary = promoSummary;
exports.exportShoppingGuide = exportShoppingGuide;
exports.exportRecordsCsv = exportRecordsCsv;
exports.importRecordsCsv = importRecordsCsv;
