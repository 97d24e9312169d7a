import { createAwsPipeline, processUpload } from "../services/SummaryPipelineService.js";

/**
 * Usage: tsx backend/manual_tests/testSummarizeDocument.ts <bucket> <key>
 */
async function testSummarizeDocument() {
  const [bucket, key] = process.argv.slice(2);
  if (!bucket || !key) {
    console.log("Usage: testSummarizeDocument.ts <bucket> <key>");
    process.exit(1);
  }

  console.log(`Summarizing s3://${bucket}/${key}`);

  const result = await processUpload(
    { Records: [{ s3: { bucket: { name: bucket }, object: { key: encodeURIComponent(key) } } }] },
    createAwsPipeline
  );

  console.log("\n=== Result ===");
  console.log(`Status: ${result.statusCode}`);
  console.log(result.body);
}

testSummarizeDocument().catch(console.error);
