import { given } from "@nivinjoseph/n-defensive";
import * as aws from "@pulumi/aws";
import * as Pulumi from "@pulumi/pulumi";
import { StackConfig } from "../stack-config.js";
import type { PolicyDocument } from "../security/policy/policy-document.js";
import type { S3bucketConfig } from "./s3bucket-config.js";
import type { S3bucketDetails } from "./s3bucket-details.js";


export class S3bucketProvisioner
{
    private readonly _name: string;
    private readonly _config: S3bucketConfig;
    private readonly _indexDocument: string;
    private readonly _resourceOptions: Pulumi.CustomResourceOptions;


    public constructor(name: string, config: S3bucketConfig)
    {
        given(name, "name").ensureHasValue().ensureIsString();
        this._name = name;

        given(config, "config").ensureHasValue()
            .ensureHasStructure({
                bucketName: "string",
                isPublic: "boolean",
                "indexDocument?": "string",
                "errorDocument?": "string",
                "forceDestroy?": "boolean",
                "provider?": "object"
            })
            .ensure(t => /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/.test(t.bucketName),
                "bucketName must be 3 to 63 lowercase letters, numbers, dots or hyphens, beginning and ending with a letter or number")
            .ensure(t => !t.bucketName.contains(".."), "bucketName cannot contain adjacent periods")
            .ensure(t => t.indexDocument == null || (t.indexDocument.trim().length > 0 && !t.indexDocument.contains("/")),
                "indexDocument must be a file name without a path");

        config.forceDestroy ??= false;
        this._config = config;
        this._indexDocument = config.indexDocument?.trim() ?? "index.html";

        this._resourceOptions = { provider: config.provider };
    }


    public static createPublicReadPolicyDocument(bucketArn: string): PolicyDocument
    {
        given(bucketArn, "bucketArn").ensureHasValue().ensureIsString()
            .ensure(t => t.startsWith("arn:"), "bucketArn must be an arn");

        return {
            Version: "2012-10-17",
            Statement: [
                {
                    Sid: "PublicReadGetObject",
                    Effect: "Allow",
                    Principal: "*",
                    Action: "s3:GetObject",
                    Resource: `${bucketArn}/*`
                }
            ]
        };
    }

    public provision(): S3bucketDetails
    {
        const bucketName = this._config.bucketName;

        try
        {
            const bucket = new aws.s3.BucketV2(bucketName, {
                bucket: bucketName,
                forceDestroy: this._config.forceDestroy,
                tags: {
                    ...StackConfig.tags,
                    Name: bucketName
                }
            }, this._resourceOptions);

            new aws.s3.BucketServerSideEncryptionConfigurationV2(`${this._name}-bucket-sse`, {
                bucket: bucket.id,
                rules: [{
                    applyServerSideEncryptionByDefault: {
                        sseAlgorithm: "AES256"
                    },
                    bucketKeyEnabled: true
                }]
            }, this._resourceOptions);

            const publicAccessBlock = new aws.s3.BucketPublicAccessBlock(`${this._name}-bucket-pab`, {
                bucket: bucket.id,
                blockPublicAcls: !this._config.isPublic,
                ignorePublicAcls: !this._config.isPublic,
                blockPublicPolicy: !this._config.isPublic,
                restrictPublicBuckets: !this._config.isPublic
            }, this._resourceOptions);

            const websiteEndpoint = this._config.isPublic
                ? this._provisionPublicAccess(bucket, publicAccessBlock)
                : null;

            StackConfig.logger.logInfo(`Created S3 bucket: ${bucketName}`);

            return {
                bucketId: bucket.id,
                bucketName: bucket.bucket,
                bucketArn: bucket.arn,
                websiteEndpoint
            };
        }
        catch (e)
        {
            StackConfig.logger.logError(`Failed to create S3 bucket ${bucketName}`, e);
            throw e;
        }
    }

    private _provisionPublicAccess(bucket: aws.s3.BucketV2, publicAccessBlock: aws.s3.BucketPublicAccessBlock): Pulumi.Output<string>
    {
        new aws.s3.BucketOwnershipControls(`${this._name}-bucket-oc`, {
            bucket: bucket.id,
            rule: {
                objectOwnership: "ObjectWriter"
            }
        }, this._resourceOptions);

        const website = new aws.s3.BucketWebsiteConfigurationV2(`${this._name}-bucket-web`, {
            bucket: bucket.id,
            indexDocument: {
                suffix: this._indexDocument
            },
            errorDocument: this._config.errorDocument != null
                ? { key: this._config.errorDocument }
                : undefined
        }, this._resourceOptions);

        // a policy granting public read is rejected while the access block is still in place
        new aws.s3.BucketPolicy(`${this._name}-bucket-pol`, {
            bucket: bucket.id,
            policy: bucket.arn.apply(arn => JSON.stringify(S3bucketProvisioner.createPublicReadPolicyDocument(arn)))
        }, {
            ...this._resourceOptions,
            dependsOn: [publicAccessBlock]
        });

        return website.websiteEndpoint;
    }
}
