import { describe, expect, it } from "vitest";
import { S3bucketProvisioner } from "../../src/storage/s3bucket-provisioner.js";
import { promiseOf, useStackTestContext } from "../helpers/stack-test-context.js";


describe("S3bucketProvisioner", () =>
{
    const { mocks, logger } = useStackTestContext();

    describe("public bucket", () =>
    {
        it("should serve the bucket as a website readable by anyone", async () =>
        {
            const details = new S3bucketProvisioner("site", {
                bucketName: "test-site-bucket",
                isPublic: true,
                errorDocument: "error.html"
            }).provision();

            expect(await promiseOf(details.bucketName)).toBe("test-site-bucket");
            expect(await promiseOf(details.bucketArn)).toBe("arn:aws:s3:::test-site-bucket");
            expect(details.websiteEndpoint).not.toBeNull();
            if (details.websiteEndpoint != null)
                expect(await promiseOf(details.websiteEndpoint)).toBe("test-site-bucket.s3-website-us-east-1.amazonaws.com");

            const accessBlock = await mocks.waitFor("aws:s3/bucketPublicAccessBlock:BucketPublicAccessBlock", "site-bucket-pab");
            expect(accessBlock.inputs).toMatchObject({
                bucket: "test-site-bucket",
                blockPublicAcls: false,
                ignorePublicAcls: false,
                blockPublicPolicy: false,
                restrictPublicBuckets: false
            });

            const website = await mocks.waitFor("aws:s3/bucketWebsiteConfigurationV2:BucketWebsiteConfigurationV2", "site-bucket-web");
            expect(website.inputs.indexDocument).toEqual({ suffix: "index.html" });
            expect(website.inputs.errorDocument).toEqual({ key: "error.html" });

            const policy = await mocks.waitFor("aws:s3/bucketPolicy:BucketPolicy", "site-bucket-pol");
            expect(policy.inputs.bucket).toBe("test-site-bucket");
            expect(JSON.parse(String(policy.inputs.policy))).toEqual({
                Version: "2012-10-17",
                Statement: [{
                    Sid: "PublicReadGetObject",
                    Effect: "Allow",
                    Principal: "*",
                    Action: "s3:GetObject",
                    Resource: "arn:aws:s3:::test-site-bucket/*"
                }]
            });

            const ownership = await mocks.waitFor("aws:s3/bucketOwnershipControls:BucketOwnershipControls", "site-bucket-oc");
            expect(ownership.inputs.rule).toEqual({ objectOwnership: "ObjectWriter" });

            expect(logger.lines).toEqual(["INFO Created S3 bucket: test-site-bucket"]);
        });
    });

    describe("private bucket", () =>
    {
        it("should block all public access and expose no website", async () =>
        {
            const details = new S3bucketProvisioner("vault", {
                bucketName: "test-vault-bucket",
                isPublic: false
            }).provision();

            expect(details.websiteEndpoint).toBeNull();

            const bucket = await mocks.waitFor("aws:s3/bucketV2:BucketV2", "test-vault-bucket");
            expect(bucket.inputs).toMatchObject({ bucket: "test-vault-bucket", forceDestroy: false });

            const encryption = await mocks.waitFor("aws:s3/bucketServerSideEncryptionConfigurationV2:BucketServerSideEncryptionConfigurationV2", "vault-bucket-sse");
            expect(encryption.inputs.rules).toMatchObject([{ applyServerSideEncryptionByDefault: { sseAlgorithm: "AES256" } }]);

            const accessBlock = await mocks.waitFor("aws:s3/bucketPublicAccessBlock:BucketPublicAccessBlock", "vault-bucket-pab");
            expect(accessBlock.inputs).toMatchObject({
                blockPublicAcls: true,
                ignorePublicAcls: true,
                blockPublicPolicy: true,
                restrictPublicBuckets: true
            });

            await mocks.settle();
            expect(mocks.ofType("aws:s3/bucketPolicy:BucketPolicy")).toHaveLength(0);
            expect(mocks.ofType("aws:s3/bucketWebsiteConfigurationV2:BucketWebsiteConfigurationV2")).toHaveLength(0);
        });
    });

    describe("createPublicReadPolicyDocument", () =>
    {
        it("should grant anonymous GetObject on every key of the bucket", () =>
        {
            expect(S3bucketProvisioner.createPublicReadPolicyDocument("arn:aws:s3:::assets")).toEqual({
                Version: "2012-10-17",
                Statement: [{
                    Sid: "PublicReadGetObject",
                    Effect: "Allow",
                    Principal: "*",
                    Action: "s3:GetObject",
                    Resource: "arn:aws:s3:::assets/*"
                }]
            });
        });

        it("should reject a value that is not an arn", () =>
        {
            expect(() => S3bucketProvisioner.createPublicReadPolicyDocument("assets")).toThrow();
        });
    });

    describe("validation", () =>
    {
        it.each(["Test-Bucket", "ab", "test..bucket", "-test-bucket", "test_bucket"])("should reject bucket name %s", (bucketName) =>
        {
            expect(() => new S3bucketProvisioner("site", { bucketName, isPublic: false })).toThrow();
        });

        it("should reject an index document with a path", () =>
        {
            expect(() => new S3bucketProvisioner("site", {
                bucketName: "test-site-bucket",
                isPublic: true,
                indexDocument: "docs/index.html"
            })).toThrow();
        });
    });
});
