/**
 * Built-in default templates
 * These are used when no user templates are configured
 */

/**
 * Default Java class template
 * One field per data item, one stub per paragraph, accessors last
 */
export function getDefaultClassTemplate(): string {
  return `package {{packageName}};

import java.math.BigDecimal;
import java.util.logging.Logger;

/**
 * Migrated from COBOL program: {{comment programId}}
{{#if sourceRelativePath}}
 * Source: {{comment sourceRelativePath}}
{{/if}}
 * Target stack: {{comment targetStack}}
 */
public class {{className}} {

    private static final Logger logger = Logger.getLogger({{className}}.class.getName());

    // Data items from WORKING-STORAGE SECTION
{{#each fields}}
    private {{type}} {{name}} = {{initializer}};
{{/each}}

    /**
     * Main entry point
     */
    public static void main(String[] args) {
        {{className}} program = new {{className}}();
        program.execute();
    }

    /**
     * Execute main logic
     */
    public void execute() {
        logger.info({{javaString (join "Starting " programId " execution")}});
        mainLogic();
        logger.info({{javaString (join "Completed " programId " execution")}});
    }

    /**
     * Main logic (translated from PROCEDURE DIVISION)
     */
    private void mainLogic() {
        // TODO: Implement main logic
        // Original COBOL procedures: {{comment (joinList procedureNames ", ")}}
        logger.info("Main logic executed");
    }
{{#each methods}}

    /**
     * Procedure: {{comment sourceName}}
     */
    private void {{name}}() {
        // TODO: Implement {{comment sourceName}} logic
        logger.info({{javaString (join "Executing " name)}});
    }
{{/each}}

    // Getters and Setters
{{#each fields}}
    public {{type}} get{{accessorSuffix}}() {
        return {{name}};
    }

    public void set{{accessorSuffix}}({{type}} {{name}}) {
        this.{{name}} = {{name}};
    }

{{/each}}
}
`;
}

/**
 * Default JUnit 5 test template paired with the class template
 */
export function getDefaultTestTemplate(): string {
  return `package {{packageName}};

import static org.junit.jupiter.api.Assertions.assertDoesNotThrow;
import static org.junit.jupiter.api.Assertions.assertEquals;

import java.math.BigDecimal;
import org.junit.jupiter.api.Test;

/**
 * Generated tests for {{className}}
 */
public class {{testClassName}} {

    @Test
    public void executeRunsWithoutErrors() {
        {{className}} program = new {{className}}();
        assertDoesNotThrow(() -> program.execute());
    }
{{#each fields}}

    @Test
    public void {{name}}AccessorsRoundTrip() {
        {{../className}} program = new {{../className}}();
        program.set{{accessorSuffix}}({{sample}});
        assertEquals({{sample}}, program.get{{accessorSuffix}}());
    }
{{/each}}
}
`;
}
