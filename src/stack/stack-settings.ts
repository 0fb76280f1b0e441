import * as aws from "@pulumi/aws";
import * as Pulumi from "@pulumi/pulumi";
import { StackConfig } from "../stack-config.js";


export interface StackSettings
{
    region: aws.Region;
    instanceType: string;
    bucketName: string;
    bucketIsPublic: boolean;
    dbName: string;
    dbInstanceClass: string;
    dbUsername: Pulumi.Input<string>;
    /** null means a password is generated */
    dbPassword: Pulumi.Input<string> | null;
    minSize: number;
    maxSize: number;
    desiredCapacity: number;
    bastionEnabled: boolean;
    logFile: string;
}


/**
 * Reads the `aws` and `tierstack` config namespaces of the current stack,
 * falling back to fixed defaults for every key that is not set.
 */
export function loadStackSettings(): StackSettings
{
    return {
        region: StackConfig.awsRegion,
        instanceType: StackConfig.getConfig("instance_type") ?? "t2.micro",
        bucketName: StackConfig.getConfig("bucket_name") ?? "tierstack-static-content",
        bucketIsPublic: StackConfig.getBoolean("bucket_public") ?? true,
        dbName: StackConfig.getConfig("db_name") ?? "appdb",
        dbInstanceClass: StackConfig.getConfig("db_instance_class") ?? "db.t3.micro",
        dbUsername: StackConfig.getSecret("db_username") ?? "appuser",
        dbPassword: StackConfig.getSecret("db_password"),
        minSize: StackConfig.getNumber("min_size") ?? 2,
        maxSize: StackConfig.getNumber("max_size") ?? 4,
        desiredCapacity: StackConfig.getNumber("desired_capacity") ?? 2,
        bastionEnabled: StackConfig.getBoolean("bastion_enabled") ?? false,
        logFile: StackConfig.getConfig("log_file") ?? "deployment.log"
    };
}
