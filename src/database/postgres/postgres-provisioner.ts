import { given } from "@nivinjoseph/n-defensive";
import * as aws from "@pulumi/aws";
import * as Pulumi from "@pulumi/pulumi";
import * as random from "@pulumi/random";
import { EnvType } from "../../env-type.js";
import { StackConfig } from "../../stack-config.js";
import type { PostgresConfig } from "./postgres-config.js";
import type { PostgresDetails } from "./postgres-details.js";


export class PostgresProvisioner
{
    private readonly _name: string;
    private readonly _config: PostgresConfig;
    private readonly _resourceOptions: Pulumi.CustomResourceOptions;


    public constructor(name: string, config: PostgresConfig)
    {
        given(name, "name").ensureHasValue().ensureIsString();
        this._name = name.trim();

        given(config, "config").ensureHasValue().ensureIsObject()
            .ensureHasStructure({
                subnetIds: ["object"],
                securityGroupIds: ["object"],
                databaseName: "string",
                instanceClass: "string",
                "provider?": "object"
            })
            .ensure(t => t.subnetIds.length >= 2, "at least 2 subnets in different availability zones must be provided")
            .ensure(t => t.securityGroupIds.isNotEmpty, "at least 1 security group must be provided")
            .ensure(t => /^[A-Za-z][A-Za-z0-9_]{0,62}$/.test(t.databaseName),
                "databaseName must begin with a letter and contain only letters, numbers or underscores (max 63)")
            .ensure(t => t.instanceClass.startsWith("db."), "instanceClass must be a db instance class");
        given(config.username, "config.username").ensureHasValue();
        this._config = config;

        this._resourceOptions = { provider: config.provider };
    }


    public provision(): PostgresDetails
    {
        const postgresDbPort = 5432;

        const subnetGroupName = `${this._name}-subnet-grp`;
        let subnetGroup: aws.rds.SubnetGroup;
        try
        {
            subnetGroup = new aws.rds.SubnetGroup(subnetGroupName, {
                subnetIds: [...this._config.subnetIds],
                tags: {
                    ...StackConfig.tags,
                    Name: subnetGroupName
                }
            }, this._resourceOptions);

            StackConfig.logger.logInfo(`Created DB subnet group: ${subnetGroupName}`);
        }
        catch (e)
        {
            StackConfig.logger.logError(`Failed to create DB subnet group ${subnetGroupName}`, e);
            throw e;
        }

        try
        {
            const password = this._config.password != null
                ? Pulumi.output(this._config.password)
                : new random.RandomPassword(`${this._name}-rpass`, {
                    length: 16,
                    special: true,
                    overrideSpecial: `_`
                }).result;

            const isProd = StackConfig.env === EnvType.prod;

            const db = new aws.rds.Instance(this._name, {
                instanceClass: this._config.instanceClass,
                allocatedStorage: 20,
                engine: "postgres",
                engineVersion: "13.7",
                dbName: this._config.databaseName,
                username: this._config.username,
                password: Pulumi.secret(password),
                port: postgresDbPort,
                vpcSecurityGroupIds: [...this._config.securityGroupIds],
                dbSubnetGroupName: subnetGroup.name,
                multiAz: true,
                publiclyAccessible: false,
                storageEncrypted: true,
                backupRetentionPeriod: isProd ? 5 : 1,
                skipFinalSnapshot: !isProd,
                finalSnapshotIdentifier: isProd ? `${this._name}-final` : undefined,
                applyImmediately: true,
                tags: {
                    ...StackConfig.tags,
                    Name: this._name
                }
            }, this._resourceOptions);

            StackConfig.logger.logInfo(`Created RDS instance: ${this._name}`);

            return {
                endpoint: db.endpoint,
                address: db.address,
                port: db.port,
                databaseName: db.dbName,
                username: Pulumi.output(this._config.username),
                password: Pulumi.secret(password)
            };
        }
        catch (e)
        {
            StackConfig.logger.logError(`Failed to create RDS instance ${this._name}`, e);
            throw e;
        }
    }
}
