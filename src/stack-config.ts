import { EnvType } from "./env-type.js";
import * as Pulumi from "@pulumi/pulumi";
import { given } from "@nivinjoseph/n-defensive";
import * as aws from "@pulumi/aws";
import type { ProvisionLogger } from "./logging/provision-logger.js";
import { EngineProvisionLogger } from "./logging/engine-provision-logger.js";


export class StackConfig
{
    private static readonly _pulumiAwsConfig = new Pulumi.Config("aws");
    private static readonly _pulumiAppConfig = new Pulumi.Config("tierstack");
    private static readonly _defaultRegion = aws.Region.USEast1;
    private static _userTags: Record<string, string> | null = null;
    private static _logger: ProvisionLogger = new EngineProvisionLogger();


    public static get awsRegion(): aws.Region
    {
        const configured = this._pulumiAwsConfig.get("region");
        if (configured == null)
            return this._defaultRegion;

        const region = Object.values(aws.Region).find(t => t === configured.trim());
        if (region == null)
            throw new Error(`Invalid AWS region ${configured}`);

        return region;
    }

    public static get env(): EnvType
    {
        const stack = Pulumi.getStack();
        const env = Object.values(EnvType).find(t => t === stack);
        if (env == null)
            throw new Error(`Stack ${stack} does not name a supported env (${Object.values(EnvType).join(", ")})`);

        return env;
    }

    public static get tags(): Record<string, string>
    {
        return {
            provisioner: "tierstack",
            env: this.env,
            ...this._userTags
        };
    }

    public static get logger(): ProvisionLogger { return this._logger; }


    private constructor() { }


    public static configureTags(tags: Record<string, string>): void
    {
        given(tags, "tags").ensureHasValue().ensureIsObject();

        this._userTags = tags;
    }

    public static configureLogger(logger: ProvisionLogger): void
    {
        given(logger, "logger").ensureHasValue().ensureIsObject();

        this._logger = logger;
    }

    public static getConfig(key: string): string | null
    {
        return this._pulumiAppConfig.get(key)?.toString() ?? null;
    }

    public static requireConfig(key: string): string
    {
        return this._pulumiAppConfig.require(key).toString();
    }

    public static getNumber(key: string): number | null
    {
        return this._pulumiAppConfig.getNumber(key) ?? null;
    }

    public static getBoolean(key: string): boolean | null
    {
        return this._pulumiAppConfig.getBoolean(key) ?? null;
    }

    public static getSecret(key: string): Pulumi.Output<string> | null
    {
        return this._pulumiAppConfig.getSecret(key) ?? null;
    }
}
